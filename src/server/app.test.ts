import { describe, expect, it } from "vitest";
import type { StatusRecord } from "#mirror/status-tracker";
import { createStatusApp } from "./app";
import { evaluateHealth, renderStatusReport } from "./status-report";

const now = new Date("2026-01-01T00:20:00.000Z");
const clock = () => now;

const record = (overrides: Partial<StatusRecord> & { jobId: string }): StatusRecord => ({
	ok: true,
	message: "Synced",
	updatedAt: new Date("2026-01-01T00:19:00.000Z"),
	lastSuccessAt: new Date("2026-01-01T00:19:00.000Z"),
	...overrides,
});

describe("evaluateHealth", () => {
	it("flags failing and stale jobs separately", () => {
		const health = evaluateHealth(
			[
				record({ jobId: "fresh" }),
				record({ jobId: "failing", ok: false }),
				record({
					jobId: "stale",
					lastSuccessAt: new Date("2026-01-01T00:04:00.000Z"),
				}),
				record({ jobId: "never", lastSuccessAt: null }),
			],
			now,
			15 * 60 * 1000,
		);
		expect(health).toEqual({
			healthy: false,
			failing: ["failing"],
			stale: ["stale", "never"],
		});
	});

	it("accepts a success exactly at the threshold", () => {
		const health = evaluateHealth(
			[
				record({
					jobId: "edge",
					lastSuccessAt: new Date("2026-01-01T00:05:00.000Z"),
				}),
			],
			now,
			15 * 60 * 1000,
		);
		expect(health.healthy).toBe(true);
	});
});

describe("renderStatusReport", () => {
	it("renders problems first, then every job in order", () => {
		const statuses = [
			record({ jobId: "a" }),
			record({ jobId: "b", ok: false, message: "Pull\nfatal: boom", lastSuccessAt: null }),
		];
		const report = renderStatusReport(
			statuses,
			evaluateHealth(statuses, now, 15 * 60 * 1000),
		);
		expect(report).toBe(
			[
				'Repo "b" is failing',
				'Repo "b" possibly not fresh',
				"---- repo a ----",
				"OK now?    true",
				"Last OK:   2026-01-01T00:19:00.000Z",
				"Last try:  2026-01-01T00:19:00.000Z",
				"Synced",
				"---- repo b ----",
				"OK now?    false",
				"Last OK:   never",
				"Last try:  2026-01-01T00:19:00.000Z",
				"Pull",
				"fatal: boom",
				"",
			].join("\n"),
		);
	});
});

describe("GET /status", () => {
	it("returns 200 with a plain-text report when every job is healthy", async () => {
		const app = createStatusApp({
			snapshots: () => [record({ jobId: "a" })],
			clock,
		});

		const response = await app.request("/status");

		expect(response.status).toBe(200);
		expect(response.headers.get("content-type")).toMatch(/^text\/plain/);
		expect(await response.text()).toBe(
			"---- repo a ----\nOK now?    true\nLast OK:   2026-01-01T00:19:00.000Z\nLast try:  2026-01-01T00:19:00.000Z\nSynced\n",
		);
	});

	it("returns 500 for a stale job even when nothing is failing", async () => {
		const app = createStatusApp({
			snapshots: () => [
				record({
					jobId: "a",
					lastSuccessAt: new Date("2026-01-01T00:00:00.000Z"),
				}),
			],
			clock,
		});

		const response = await app.request("/status");

		expect(response.status).toBe(500);
		expect((await response.text()).split("\n")[0]).toBe(
			'Repo "a" possibly not fresh',
		);
	});

	it("returns 500 when a job reports a failure", async () => {
		const app = createStatusApp({
			snapshots: () => [record({ jobId: "a", ok: false })],
			clock,
		});

		const response = await app.request("/status");

		expect(response.status).toBe(500);
	});

	it("honours a custom staleness threshold", async () => {
		const app = createStatusApp({
			snapshots: () => [record({ jobId: "a" })],
			staleAfterMs: 30 * 1000,
			clock,
		});

		const response = await app.request("/status");

		expect(response.status).toBe(500);
	});

	it("redirects the root to the status report", async () => {
		const app = createStatusApp({ snapshots: () => [], clock });

		const response = await app.request("/");

		expect(response.status).toBe(307);
		expect(response.headers.get("location")).toBe("/status");
	});
});
