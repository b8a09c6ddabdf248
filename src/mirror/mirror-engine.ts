import type { MirrorJob } from "#config";
import { GitCommandError } from "#core/errors";
import type { JobLayout } from "#core/paths";
import { type GitClient, MIRROR_REMOTE } from "#git/git-client";
import {
	detectChanges,
	EMPTY_SNAPSHOT,
	type SyncSnapshot,
} from "#mirror/change-detector";
import type { RateLimiter } from "#mirror/rate-limiter";
import { type Sleep, sleep as defaultSleep } from "#mirror/sleep";
import type { StatusTracker } from "#mirror/status-tracker";

export const CLONE_RETRY_DELAY_MS = 10000;
export const REMOTE_RETRY_DELAY_MS = 1000;

export type MirrorPhase =
	| "cloning"
	| "credentials"
	| "adding-remote"
	| "syncing"
	| "stopped";

export type IterationResult =
	| { outcome: "synced"; pushedBranches: boolean; pushedTags: boolean }
	| { outcome: "failed"; stage: string }
	| { outcome: "aborted" };

export type MirrorEngine = {
	readonly jobId: string;
	/** Bootstraps the working copy, then syncs until `signal` aborts. */
	run: (signal?: AbortSignal) => Promise<void>;
	/** Clone, credentials and remote registration. `false` when aborted. */
	bootstrap: (signal?: AbortSignal) => Promise<boolean>;
	/** One pull/detect/push pass, without waiting for the rate limiter. */
	syncOnce: (signal?: AbortSignal) => Promise<IterationResult>;
	getPhase: () => MirrorPhase;
	getSnapshot: () => SyncSnapshot;
};

export type MirrorEngineOptions = {
	job: Readonly<MirrorJob>;
	layout: JobLayout;
	git: GitClient;
	tracker: StatusTracker;
	limiter: RateLimiter;
	sleep?: Sleep;
	cloneRetryDelayMs?: number;
	remoteRetryDelayMs?: number;
};

// A cancelled call is the shutdown path, not a failure worth reporting
const isCancellation = (error: unknown, signal?: AbortSignal) =>
	Boolean(signal?.aborted) ||
	(error instanceof GitCommandError && error.cancelled);

const outputOf = (error: unknown) =>
	error instanceof GitCommandError ? error.output : undefined;

export const createMirrorEngine = (
	options: MirrorEngineOptions,
): MirrorEngine => {
	const { job, layout, git, tracker, limiter } = options;
	const sleep = options.sleep ?? defaultSleep;
	const cloneRetryDelayMs = options.cloneRetryDelayMs ?? CLONE_RETRY_DELAY_MS;
	const remoteRetryDelayMs =
		options.remoteRetryDelayMs ?? REMOTE_RETRY_DELAY_MS;

	let phase: MirrorPhase = "cloning";
	let snapshot: SyncSnapshot = EMPTY_SNAPSHOT;

	const callOptions = (signal?: AbortSignal) => ({
		signal,
		logger: tracker.debug,
	});

	const fail = (stage: string, error: unknown) => {
		tracker.fail(stage, { error, output: outputOf(error) });
	};

	const cloneUntilDone = async (signal?: AbortSignal) => {
		phase = "cloning";
		tracker.ok("Cloning");
		while (!signal?.aborted) {
			try {
				// A working copy left by an earlier attempt or process cannot be
				// cloned over
				await git.removeDir(layout.repoDir);
				const output = await git.clone(
					job.from,
					layout.repoDir,
					callOptions(signal),
				);
				tracker.ok("Cloned", { output });
				return true;
			} catch (error) {
				if (isCancellation(error, signal)) {
					return false;
				}
				fail("Cloning", error);
			}
			if (!(await sleep(cloneRetryDelayMs, signal))) {
				return false;
			}
		}
		return false;
	};

	const setUpCredentials = async (signal?: AbortSignal) => {
		if (!job.httpCookie) {
			return;
		}
		phase = "credentials";
		try {
			const output = await git.installCookieFile(
				layout.repoDir,
				layout.cookieFile,
				job.httpCookie,
				callOptions(signal),
			);
			tracker.ok("Set http.cookiefile", { output });
		} catch (error) {
			if (isCancellation(error, signal)) {
				return;
			}
			// Best effort: bootstrap carries on without the cookie
			fail("Setting up HTTP cookie file", error);
		}
	};

	const addRemoteUntilDone = async (signal?: AbortSignal) => {
		phase = "adding-remote";
		while (!signal?.aborted) {
			tracker.ok("Setting remote");
			try {
				const output = await git.addRemote(
					layout.repoDir,
					MIRROR_REMOTE,
					job.to,
					callOptions(signal),
				);
				tracker.ok("Added remote", { output });
				return true;
			} catch (error) {
				if (isCancellation(error, signal)) {
					return false;
				}
				fail("Adding remote", error);
			}
			if (!(await sleep(remoteRetryDelayMs, signal))) {
				return false;
			}
		}
		return false;
	};

	const bootstrap = async (signal?: AbortSignal) => {
		if (!(await cloneUntilDone(signal))) {
			phase = "stopped";
			return false;
		}
		await setUpCredentials(signal);
		if (signal?.aborted || !(await addRemoteUntilDone(signal))) {
			phase = "stopped";
			return false;
		}
		phase = "syncing";
		return true;
	};

	const syncOnce = async (signal?: AbortSignal): Promise<IterationResult> => {
		// Each step either yields a value or ends the iteration with a
		// recorded failure; the snapshot only moves after every push succeeded.
		const step = async <T>(
			stage: string,
			action: () => Promise<T>,
		): Promise<{ ok: true; value: T } | { ok: false; result: IterationResult }> => {
			try {
				return { ok: true, value: await action() };
			} catch (error) {
				if (isCancellation(error, signal)) {
					return { ok: false, result: { outcome: "aborted" } };
				}
				fail(stage, error);
				return { ok: false, result: { outcome: "failed", stage } };
			}
		};

		tracker.debug("Pulling");
		const pulled = await step("Pull", () =>
			git.pull(layout.repoDir, callOptions(signal)),
		);
		if (!pulled.ok) return pulled.result;
		tracker.debug(`Pulled: ${pulled.value}`);

		const head = await step("Reading branch head", () =>
			git.readHead(layout.repoDir, job.branch),
		);
		if (!head.ok) return head.result;

		const tags = await step("Listing tags", () =>
			git.listTags(layout.repoDir, callOptions(signal)),
		);
		if (!tags.ok) return tags.result;

		const current = { head: head.value, tags: tags.value };
		const decision = detectChanges(snapshot, current);

		if (decision.pushBranches) {
			tracker.debug("Pushing");
			const pushed = await step("Push", () =>
				git.push(layout.repoDir, MIRROR_REMOTE, "all", callOptions(signal)),
			);
			if (!pushed.ok) return pushed.result;
		}

		if (decision.pushTags) {
			tracker.debug("Pushing tags");
			const pushed = await step("Push tags", () =>
				git.push(layout.repoDir, MIRROR_REMOTE, "tags", callOptions(signal)),
			);
			if (!pushed.ok) return pushed.result;
		}

		tracker.ok("Synced");
		snapshot = Object.freeze({
			head: current.head,
			tags: Object.freeze([...current.tags]),
		});
		return {
			outcome: "synced",
			pushedBranches: decision.pushBranches,
			pushedTags: decision.pushTags,
		};
	};

	const run = async (signal?: AbortSignal) => {
		if (!(await bootstrap(signal))) {
			return;
		}
		while (await limiter.wait(signal)) {
			const result = await syncOnce(signal);
			if (result.outcome === "aborted") {
				break;
			}
		}
		phase = "stopped";
	};

	return {
		jobId: job.id,
		run,
		bootstrap,
		syncOnce,
		getPhase: () => phase,
		getSnapshot: () => snapshot,
	};
};
