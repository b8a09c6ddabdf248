import type { MirrorConfig, MirrorJob } from "#config";
import { toErrorMessage } from "#core/errors";
import type { Logger } from "#core/logger";
import { getJobLayout, resolveWorkDir } from "#core/paths";
import { type GitClient, createGitClient } from "#git/git-client";
import { createMirrorEngine, type MirrorEngine } from "#mirror/mirror-engine";
import { createRateLimiter } from "#mirror/rate-limiter";
import type { Sleep } from "#mirror/sleep";
import {
	createStatusTracker,
	type StatusRecord,
	type StatusTracker,
} from "#mirror/status-tracker";

export type SupervisedJob = {
	readonly job: Readonly<MirrorJob>;
	readonly tracker: StatusTracker;
	readonly engine: MirrorEngine;
};

export type Supervisor = {
	readonly jobs: readonly SupervisedJob[];
	/**
	 * Runs every job concurrently until `signal` aborts. Resolves once all
	 * engines have stopped.
	 */
	start: (signal?: AbortSignal) => Promise<void>;
	/** Status of every job, in configured order. */
	snapshots: () => StatusRecord[];
};

export type SupervisorOptions = {
	config: Pick<
		MirrorConfig,
		"jobs" | "workDir" | "syncIntervalMs" | "gitTimeoutMs"
	>;
	logger: Logger;
	git?: GitClient;
	clock?: () => Date;
	sleep?: Sleep;
};

export const createSupervisor = (options: SupervisorOptions): Supervisor => {
	const { config, logger, clock } = options;
	const limiterClock = clock ? () => clock().getTime() : undefined;
	const git =
		options.git ?? createGitClient({ timeoutMs: config.gitTimeoutMs });
	const workDir = resolveWorkDir(config.workDir);

	const jobs: SupervisedJob[] = config.jobs.map((job) => {
		const tracker = createStatusTracker({
			jobId: job.id,
			endpoints: { from: job.from, to: job.to },
			logger,
			clock,
		});
		const engine = createMirrorEngine({
			job,
			layout: getJobLayout(workDir, job.id),
			git,
			tracker,
			limiter: createRateLimiter({
				intervalMs: config.syncIntervalMs,
				clock: limiterClock,
				sleep: options.sleep,
			}),
			sleep: options.sleep,
		});
		return { job, tracker, engine };
	});

	const runJob = async (entry: SupervisedJob, signal?: AbortSignal) => {
		try {
			await entry.engine.run(signal);
		} catch (error) {
			// Git failures never reach here; anything else stays within this job
			entry.tracker.fail("Mirror engine crashed", { error });
			logger.error(
				{ job: entry.job.id, error: entry.tracker.redact(toErrorMessage(error)) },
				"mirror engine stopped unexpectedly",
			);
		}
	};

	return {
		jobs: Object.freeze(jobs),
		start: async (signal) => {
			await Promise.all(jobs.map((entry) => runJob(entry, signal)));
		},
		snapshots: () => jobs.map((entry) => entry.tracker.snapshot()),
	};
};
