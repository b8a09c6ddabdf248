import type { StatusRecord } from "#mirror/status-tracker";

export const DEFAULT_STALE_AFTER_MS = 15 * 60 * 1000;

export type HealthReport = {
	healthy: boolean;
	failing: string[];
	stale: string[];
};

/**
 * A job is stale when it has never succeeded or its last success is older
 * than `staleAfterMs`, even if nothing is failing right now.
 */
export const isStale = (
	status: StatusRecord,
	now: Date,
	staleAfterMs: number,
) =>
	status.lastSuccessAt === null ||
	now.getTime() - status.lastSuccessAt.getTime() > staleAfterMs;

export const evaluateHealth = (
	statuses: readonly StatusRecord[],
	now: Date,
	staleAfterMs = DEFAULT_STALE_AFTER_MS,
): HealthReport => {
	const failing = statuses
		.filter((status) => !status.ok)
		.map((status) => status.jobId);
	const stale = statuses
		.filter((status) => isStale(status, now, staleAfterMs))
		.map((status) => status.jobId);
	return {
		healthy: failing.length === 0 && stale.length === 0,
		failing,
		stale,
	};
};

const formatTime = (value: Date | null) =>
	value === null ? "never" : value.toISOString();

export const renderStatusReport = (
	statuses: readonly StatusRecord[],
	health: HealthReport,
) => {
	const lines: string[] = [];
	for (const id of health.failing) {
		lines.push(`Repo ${JSON.stringify(id)} is failing`);
	}
	for (const id of health.stale) {
		lines.push(`Repo ${JSON.stringify(id)} possibly not fresh`);
	}
	for (const status of statuses) {
		lines.push(`---- repo ${status.jobId} ----`);
		lines.push(`OK now?    ${status.ok}`);
		lines.push(`Last OK:   ${formatTime(status.lastSuccessAt)}`);
		lines.push(`Last try:  ${formatTime(status.updatedAt)}`);
		lines.push(status.message);
	}
	return `${lines.join("\n")}\n`;
};
