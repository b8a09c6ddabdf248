/**
 * Last head value and tag list observed by a job. `null` means nothing has
 * been observed yet.
 */
export type SyncSnapshot = {
	head: string | null;
	tags: readonly string[] | null;
};

export type PushDecision = {
	pushBranches: boolean;
	pushTags: boolean;
};

export const EMPTY_SNAPSHOT: SyncSnapshot = Object.freeze({
	head: null,
	tags: null,
});

const sameTags = (
	previous: readonly string[] | null,
	current: readonly string[],
) => {
	if (previous === null) {
		return false;
	}
	if (previous.length !== current.length) {
		return false;
	}
	return previous.every((tag, index) => tag === current[index]);
};

/**
 * Values are opaque and compared exactly. A snapshot that has never been
 * observed differs from everything, so the first iteration pushes both.
 */
export const detectChanges = (
	previous: SyncSnapshot,
	current: { head: string; tags: readonly string[] },
): PushDecision => ({
	pushBranches: previous.head !== current.head,
	pushTags: !sameTags(previous.tags, current.tags),
});
