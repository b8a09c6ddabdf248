import { describe, expect, it } from "vitest";
import { GitCommandError } from "#core/errors";
import { REDACTED_FROM, REDACTED_TO } from "#git/redact";
import { createTestLogger } from "#core/testing/logger";
import { composeStatusMessage, createStatusTracker } from "./status-tracker";

const createClock = (start: string) => {
	let now = new Date(start);
	return {
		clock: () => now,
		set: (value: string) => {
			now = new Date(value);
		},
	};
};

const createTracker = (clock: () => Date) =>
	createStatusTracker({
		jobId: "a",
		endpoints: { from: "u1", to: "u2" },
		logger: createTestLogger(),
		clock,
	});

describe("composeStatusMessage", () => {
	it("joins stage, error and trimmed output", () => {
		expect(
			composeStatusMessage({
				stage: "Pull",
				error: new Error("git pull exited with code 1"),
				output: "fatal: boom\n",
			}),
		).toBe("Pull\ngit pull exited with code 1\nfatal: boom");
	});

	it("skips empty output", () => {
		expect(composeStatusMessage({ stage: "Synced", output: "  \n" })).toBe(
			"Synced",
		);
	});
});

describe("createStatusTracker", () => {
	it("starts healthy without a success time", () => {
		const { clock } = createClock("2026-01-01T00:00:00.000Z");
		expect(createTracker(clock).snapshot()).toEqual({
			jobId: "a",
			ok: true,
			message: "Waiting to start",
			updatedAt: null,
			lastSuccessAt: null,
		});
	});

	it("updates the success time only for ok records", () => {
		const time = createClock("2026-01-01T00:00:00.000Z");
		const tracker = createTracker(time.clock);
		tracker.ok("Synced");
		time.set("2026-01-01T00:05:00.000Z");
		tracker.fail("Pull", { error: new Error("timeout") });

		const snapshot = tracker.snapshot();
		expect(snapshot.ok).toBe(false);
		expect(snapshot.message).toBe("Pull\ntimeout");
		expect(snapshot.updatedAt?.toISOString()).toBe("2026-01-01T00:05:00.000Z");
		expect(snapshot.lastSuccessAt?.toISOString()).toBe(
			"2026-01-01T00:00:00.000Z",
		);
	});

	it("redacts both endpoints from stored messages", () => {
		const { clock } = createClock("2026-01-01T00:00:00.000Z");
		const tracker = createTracker(clock);
		const error = new GitCommandError({
			command: "git clone u1 repo-a",
			output: "fatal: repository 'u1' not found; remote u2",
			message: "git clone exited with code 128",
			exitCode: 128,
		});
		tracker.fail("Cloning", { error, output: error.output });

		const { message } = tracker.snapshot();
		expect(message).toBe(
			`Cloning\ngit clone exited with code 128\nfatal: repository '${REDACTED_FROM}' not found; remote ${REDACTED_TO}`,
		);
		expect(message).not.toContain("u1");
		expect(message).not.toContain("u2");
	});

	it("returns frozen snapshots that later records do not change", () => {
		const { clock } = createClock("2026-01-01T00:00:00.000Z");
		const tracker = createTracker(clock);
		const before = tracker.snapshot();
		tracker.fail("Push");
		expect(Object.isFrozen(before)).toBe(true);
		expect(before.ok).toBe(true);
		expect(tracker.snapshot().ok).toBe(false);
	});
});
