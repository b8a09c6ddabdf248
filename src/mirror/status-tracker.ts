import { toErrorMessage } from "#core/errors";
import type { Logger } from "#core/logger";
import { type Endpoints, redactEndpoints } from "#git/redact";

/**
 * What a job reports after each step. `output` is the combined text of the
 * external command, if one ran.
 */
export type StatusPayload = {
	stage: string;
	output?: string;
	error?: unknown;
};

export type StatusRecord = {
	readonly jobId: string;
	readonly ok: boolean;
	readonly message: string;
	readonly updatedAt: Date | null;
	readonly lastSuccessAt: Date | null;
};

export type StatusTracker = {
	readonly jobId: string;
	ok: (stage: string, details?: Omit<StatusPayload, "stage">) => StatusRecord;
	fail: (stage: string, details?: Omit<StatusPayload, "stage">) => StatusRecord;
	debug: (message: string) => void;
	redact: (text: string) => string;
	snapshot: () => StatusRecord;
};

export type StatusTrackerOptions = {
	jobId: string;
	endpoints: Endpoints;
	logger: Logger;
	clock?: () => Date;
};

export const composeStatusMessage = (payload: StatusPayload) => {
	const lines = [payload.stage];
	if (payload.error !== undefined) {
		lines.push(toErrorMessage(payload.error));
	}
	const output = payload.output?.trim();
	if (output) {
		lines.push(output);
	}
	return lines.join("\n");
};

export const createStatusTracker = (
	options: StatusTrackerOptions,
): StatusTracker => {
	const { jobId, endpoints } = options;
	const clock = options.clock ?? (() => new Date());
	const logger = options.logger.child({ job: jobId });
	const redact = (text: string) => redactEndpoints(text, endpoints);

	// record() and snapshot() never await, so each runs as one critical
	// section and readers only ever see a whole record.
	let current: StatusRecord = Object.freeze({
		jobId,
		ok: true,
		message: "Waiting to start",
		updatedAt: null,
		lastSuccessAt: null,
	});

	const record = (ok: boolean, payload: StatusPayload) => {
		const now = clock();
		const message = redact(composeStatusMessage(payload));
		current = Object.freeze({
			jobId,
			ok,
			message,
			updatedAt: now,
			lastSuccessAt: ok ? now : current.lastSuccessAt,
		});
		if (ok) {
			logger.info(`OK: ${message}`);
		} else {
			logger.warn(`FAIL: ${message}`);
		}
		return current;
	};

	return {
		jobId,
		ok: (stage, details) => record(true, { ...details, stage }),
		fail: (stage, details) => record(false, { ...details, stage }),
		debug: (message) => logger.debug(redact(message)),
		redact,
		snapshot: () => current,
	};
};
