import path from "node:path";

export const REPO_DIR_PREFIX = "repo-";
export const COOKIE_FILENAME = "mirror-cookies";

export const resolveWorkDir = (workDir?: string) =>
	path.resolve(workDir ?? process.cwd());

export type JobLayout = {
	workDir: string;
	repoDir: string;
	cookieFile: string;
};

export const getJobLayout = (workDir: string, jobId: string): JobLayout => {
	// Security: Validate jobId doesn't contain path traversal characters
	const normalized = path.normalize(jobId);
	if (
		normalized !== jobId ||
		normalized.includes("..") ||
		path.isAbsolute(jobId) ||
		jobId.includes(path.sep)
	) {
		throw new Error(
			`Security: Invalid job ID (must be a simple identifier): ${jobId}`,
		);
	}

	const repoDir = path.join(workDir, `${REPO_DIR_PREFIX}${jobId}`);
	return {
		workDir,
		repoDir,
		cookieFile: path.join(repoDir, ".git", COOKIE_FILENAME),
	};
};
