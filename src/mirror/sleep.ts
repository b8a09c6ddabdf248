import { setTimeout as delay } from "node:timers/promises";

import { isAbortError } from "#core/errors";

/** Resolves `true` once `ms` elapsed, `false` if `signal` aborted first. */
export type Sleep = (ms: number, signal?: AbortSignal) => Promise<boolean>;

export const sleep: Sleep = async (ms, signal) => {
	if (signal?.aborted) {
		return false;
	}
	try {
		await delay(ms, undefined, { signal });
		return true;
	} catch (error) {
		if (isAbortError(error)) {
			return false;
		}
		throw error;
	}
};
