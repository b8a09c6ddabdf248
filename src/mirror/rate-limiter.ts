/**
 * Token bucket with a capacity of one token, refilled every `intervalMs`.
 *
 * The bucket starts full, so the first `wait` returns immediately. Waits
 * are spaced by at least `intervalMs` no matter how long the work between
 * them took, which caps how often a job polls its remotes.
 */

import { type Sleep, sleep as defaultSleep } from "#mirror/sleep";

export type RateLimiter = {
	/** Resolves `true` when a token was taken, `false` when aborted. */
	wait: (signal?: AbortSignal) => Promise<boolean>;
};

export type RateLimiterOptions = {
	intervalMs: number;
	clock?: () => number;
	sleep?: Sleep;
};

export const createRateLimiter = (options: RateLimiterOptions): RateLimiter => {
	const { intervalMs } = options;
	if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
		throw new Error("Rate limiter interval must be a positive number.");
	}
	const clock = options.clock ?? Date.now;
	const sleep = options.sleep ?? defaultSleep;
	let nextTokenAt = Number.NEGATIVE_INFINITY;

	const wait = async (signal?: AbortSignal) => {
		if (signal?.aborted) {
			return false;
		}
		const now = clock();
		const readyAt = Math.max(now, nextTokenAt);
		const previousTokenAt = nextTokenAt;
		// Reserve the slot before sleeping; an aborted wait gives it back
		nextTokenAt = readyAt + intervalMs;
		const waitMs = readyAt - now;
		if (waitMs <= 0) {
			return true;
		}
		const completed = await sleep(waitMs, signal);
		if (!completed) {
			nextTokenAt = previousTokenAt;
		}
		return completed;
	};

	return { wait };
};
