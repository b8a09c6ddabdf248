import { Hono } from "hono";

import type { StatusRecord } from "#mirror/status-tracker";
import {
	DEFAULT_STALE_AFTER_MS,
	evaluateHealth,
	renderStatusReport,
} from "#server/status-report";

export type StatusAppOptions = {
	snapshots: () => readonly StatusRecord[];
	staleAfterMs?: number;
	clock?: () => Date;
};

export const createStatusApp = (options: StatusAppOptions) => {
	const staleAfterMs = options.staleAfterMs ?? DEFAULT_STALE_AFTER_MS;
	const clock = options.clock ?? (() => new Date());
	const app = new Hono();

	app.get("/", (c) => c.redirect("/status", 307));

	app.get("/status", (c) => {
		const statuses = options.snapshots();
		const health = evaluateHealth(statuses, clock(), staleAfterMs);
		return c.text(
			renderStatusReport(statuses, health),
			health.healthy ? 200 : 500,
		);
	});

	return app;
};
