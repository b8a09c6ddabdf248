const MIRROR_IDENTITY = {
	name: "repo-mirror",
	email: "repo-mirror@localhost",
};

export const resolveGitCommand = () => process.env.MIRROR_GIT_COMMAND || "git";

/**
 * Environment for every git call: never prompt, ignore system and user
 * config. `pull` may create a merge commit in the working copy, so an
 * identity is always present.
 */
export const buildGitEnv = (
	source: NodeJS.ProcessEnv = process.env,
): NodeJS.ProcessEnv => {
	return {
		...source,
		GIT_TERMINAL_PROMPT: "0",
		GIT_CONFIG_NOSYSTEM: "1",
		GIT_CONFIG_NOGLOBAL: "1",
		GIT_ASKPASS: "/bin/false",
		GIT_AUTHOR_NAME: source.GIT_AUTHOR_NAME ?? MIRROR_IDENTITY.name,
		GIT_AUTHOR_EMAIL: source.GIT_AUTHOR_EMAIL ?? MIRROR_IDENTITY.email,
		GIT_COMMITTER_NAME: source.GIT_COMMITTER_NAME ?? MIRROR_IDENTITY.name,
		GIT_COMMITTER_EMAIL: source.GIT_COMMITTER_EMAIL ?? MIRROR_IDENTITY.email,
	};
};
