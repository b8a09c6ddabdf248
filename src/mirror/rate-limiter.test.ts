import { describe, expect, it, vi } from "vitest";
import { createRateLimiter } from "./rate-limiter";
import { sleep } from "./sleep";

const createFakeTime = () => {
	let now = 0;
	const clock = () => now;
	const fakeSleep = vi.fn(async (ms: number, signal?: AbortSignal) => {
		if (signal?.aborted) return false;
		now += ms;
		return true;
	});
	return {
		clock,
		sleep: fakeSleep,
		advance: (ms: number) => {
			now += ms;
		},
		now: () => now,
	};
};

describe("createRateLimiter", () => {
	it("hands out the first token immediately", async () => {
		const time = createFakeTime();
		const limiter = createRateLimiter({ intervalMs: 60000, ...time });
		await expect(limiter.wait()).resolves.toBe(true);
		expect(time.sleep).not.toHaveBeenCalled();
	});

	it("spaces tokens by the interval regardless of work duration", async () => {
		const time = createFakeTime();
		const limiter = createRateLimiter({ intervalMs: 60000, ...time });
		await limiter.wait();
		await limiter.wait();
		expect(time.sleep).toHaveBeenLastCalledWith(60000, undefined);
		expect(time.now()).toBe(60000);

		time.advance(20000);
		await limiter.wait();
		expect(time.sleep).toHaveBeenLastCalledWith(40000, undefined);
		expect(time.now()).toBe(120000);
	});

	it("does not wait when the work took longer than the interval", async () => {
		const time = createFakeTime();
		const limiter = createRateLimiter({ intervalMs: 60000, ...time });
		await limiter.wait();
		time.advance(90000);
		await limiter.wait();
		expect(time.sleep).not.toHaveBeenCalled();
	});

	it("never exceeds window / interval + 1 acquisitions", async () => {
		const time = createFakeTime();
		const intervalMs = 60000;
		const windowMs = 300000;
		const limiter = createRateLimiter({ intervalMs, ...time });
		let acquired = 0;
		while (await limiter.wait()) {
			if (time.now() > windowMs) break;
			acquired += 1;
		}
		expect(acquired).toBe(windowMs / intervalMs + 1);
	});

	it("returns false without sleeping when already aborted", async () => {
		const time = createFakeTime();
		const limiter = createRateLimiter({ intervalMs: 1000, ...time });
		const controller = new AbortController();
		controller.abort();
		await expect(limiter.wait(controller.signal)).resolves.toBe(false);
		expect(time.sleep).not.toHaveBeenCalled();
	});

	it("gives the slot back when a wait is aborted", async () => {
		let now = 0;
		let abortNext = true;
		const fakeSleep = vi.fn(async (ms: number) => {
			if (abortNext) return false;
			now += ms;
			return true;
		});
		const limiter = createRateLimiter({
			intervalMs: 1000,
			clock: () => now,
			sleep: fakeSleep,
		});
		await limiter.wait();
		await expect(limiter.wait()).resolves.toBe(false);
		abortNext = false;
		await expect(limiter.wait()).resolves.toBe(true);
		expect(fakeSleep).toHaveBeenLastCalledWith(1000, undefined);
		expect(now).toBe(1000);
	});

	it("rejects a non-positive interval", () => {
		expect(() => createRateLimiter({ intervalMs: 0 })).toThrow(
			"Rate limiter interval must be a positive number.",
		);
	});
});

describe("sleep", () => {
	it("resolves true after the delay", async () => {
		await expect(sleep(1)).resolves.toBe(true);
	});

	it("resolves false when the signal aborts", async () => {
		const controller = new AbortController();
		const pending = sleep(60000, controller.signal);
		controller.abort();
		await expect(pending).resolves.toBe(false);
	});
});
