import { chmod, readFile, rm, writeFile } from "node:fs/promises";
import path from "node:path";

import { ExecaError, execa } from "execa";

import { GitCommandError, getErrnoCode } from "#core/errors";
import { buildGitEnv, resolveGitCommand } from "#git/git-env";

export const DEFAULT_TIMEOUT_MS = 300000; // 5 minutes
export const MIRROR_REMOTE = "to";
const DEFAULT_RM_RETRIES = 3;
const DEFAULT_RM_BACKOFF_MS = 100;
const MAX_BUFFER = 10 * 1024 * 1024;

export type PushMode = "all" | "tags";

export type GitCallOptions = {
	signal?: AbortSignal;
	logger?: (message: string) => void;
};

/**
 * Operations the mirror engine needs from the version-control tool. Every
 * command resolves with its combined output and rejects with a
 * `GitCommandError` carrying that output.
 */
export type GitClient = {
	clone: (
		source: string,
		repoDir: string,
		options?: GitCallOptions,
	) => Promise<string>;
	pull: (repoDir: string, options?: GitCallOptions) => Promise<string>;
	push: (
		repoDir: string,
		remote: string,
		mode: PushMode,
		options?: GitCallOptions,
	) => Promise<string>;
	addRemote: (
		repoDir: string,
		name: string,
		url: string,
		options?: GitCallOptions,
	) => Promise<string>;
	installCookieFile: (
		repoDir: string,
		cookieFile: string,
		cookie: string,
		options?: GitCallOptions,
	) => Promise<string>;
	listTags: (repoDir: string, options?: GitCallOptions) => Promise<string[]>;
	readHead: (repoDir: string, branch?: string) => Promise<string>;
	removeDir: (dirPath: string) => Promise<void>;
};

export type GitClientOptions = {
	timeoutMs?: number;
};

const buildGitConfigs = () => [
	"-c",
	"core.hooksPath=/dev/null",
	"-c",
	"submodule.recurse=false",
	"-c",
	"protocol.ext.allow=never",
];

const buildCommandArgs = (args: string[]) => [...buildGitConfigs(), ...args];

const describeFailure = (
	subcommand: string,
	error: ExecaError,
	timeoutMs: number,
) => {
	if (error.timedOut) {
		return `git ${subcommand} timed out after ${timeoutMs}ms`;
	}
	if (error.isCanceled) {
		return `git ${subcommand} was cancelled`;
	}
	if (error.exitCode !== undefined) {
		return `git ${subcommand} exited with code ${error.exitCode}`;
	}
	return `git ${subcommand} failed: ${error.shortMessage}`;
};

const toText = (value: unknown) =>
	typeof value === "string" ? value.trim() : "";

export const createGitClient = (
	clientOptions: GitClientOptions = {},
): GitClient => {
	const timeoutMs = clientOptions.timeoutMs ?? DEFAULT_TIMEOUT_MS;

	const git = async (
		args: string[],
		options?: GitCallOptions & { cwd?: string },
	) => {
		const commandArgs = buildCommandArgs(args);
		const commandLabel = `git ${commandArgs.join(" ")}`;
		options?.logger?.(commandLabel);
		try {
			const result = await execa(resolveGitCommand(), commandArgs, {
				cwd: options?.cwd,
				timeout: timeoutMs,
				maxBuffer: MAX_BUFFER,
				all: true,
				stdin: "ignore",
				env: buildGitEnv(),
				cancelSignal: options?.signal,
			});
			return toText(result.all);
		} catch (error) {
			if (error instanceof ExecaError) {
				throw new GitCommandError({
					command: commandLabel,
					output: toText(error.all),
					message: describeFailure(args[0] ?? "", error, timeoutMs),
					exitCode: error.exitCode,
					timedOut: error.timedOut,
					cancelled: error.isCanceled,
				});
			}
			throw error;
		}
	};

	const clone: GitClient["clone"] = (source, repoDir, options) =>
		git(["clone", "--recurse-submodules=no", source, repoDir], options);

	const pull: GitClient["pull"] = (repoDir, options) =>
		git(["pull", "--no-rebase", "--no-edit"], { ...options, cwd: repoDir });

	const push: GitClient["push"] = (repoDir, remote, mode, options) =>
		git(["push", mode === "all" ? "--all" : "--tags", remote], {
			...options,
			cwd: repoDir,
		});

	const addRemote: GitClient["addRemote"] = async (
		repoDir,
		name,
		url,
		options,
	) => {
		try {
			return await git(["remote", "add", name, url], {
				...options,
				cwd: repoDir,
			});
		} catch (error) {
			if (
				!(error instanceof GitCommandError) ||
				!error.output.includes("already exists")
			) {
				throw error;
			}
		}
		return git(["remote", "set-url", name, url], {
			...options,
			cwd: repoDir,
		});
	};

	const installCookieFile: GitClient["installCookieFile"] = async (
		repoDir,
		cookieFile,
		cookie,
		options,
	) => {
		await writeFile(cookieFile, cookie, { encoding: "utf8", mode: 0o600 });
		// writeFile keeps the mode of a file that already exists
		await chmod(cookieFile, 0o600);
		return git(["config", "http.cookiefile", cookieFile], {
			...options,
			cwd: repoDir,
		});
	};

	const listTags: GitClient["listTags"] = async (repoDir, options) => {
		const output = await git(["tag", "-l"], { ...options, cwd: repoDir });
		return output
			.split(/\r?\n/)
			.map((line) => line.trim())
			.filter((line) => line.length > 0);
	};

	return {
		clone,
		pull,
		push,
		addRemote,
		installCookieFile,
		listTags,
		readHead,
		removeDir,
	};
};

const readSymbolicHead = async (gitDir: string) => {
	const head = (await readFile(path.join(gitDir, "HEAD"), "utf8")).trim();
	const match = head.match(/^ref:\s*(refs\/heads\/\S+)$/);
	if (!match?.[1]) {
		throw new Error("HEAD does not point at a local branch.");
	}
	return match[1];
};

const readPackedRef = async (gitDir: string, refName: string) => {
	let packed: string;
	try {
		packed = await readFile(path.join(gitDir, "packed-refs"), "utf8");
	} catch (error) {
		if (getErrnoCode(error) === "ENOENT") {
			return null;
		}
		throw error;
	}
	for (const line of packed.split(/\r?\n/)) {
		if (!line || line.startsWith("#") || line.startsWith("^")) continue;
		const [value, name] = line.split(" ");
		if (name === refName && value) {
			return value;
		}
	}
	return null;
};

/**
 * Reads the branch head straight from the repository metadata instead of
 * spawning `git rev-parse`. Without an explicit branch the one HEAD points
 * at is used.
 */
export const readHead = async (repoDir: string, branch?: string) => {
	const gitDir = path.join(repoDir, ".git");
	const refName = branch
		? `refs/heads/${branch}`
		: await readSymbolicHead(gitDir);
	try {
		const value = (await readFile(path.join(gitDir, refName), "utf8")).trim();
		if (value.length > 0) {
			return value;
		}
	} catch (error) {
		if (getErrnoCode(error) !== "ENOENT") {
			throw error;
		}
	}
	const packedValue = await readPackedRef(gitDir, refName);
	if (!packedValue) {
		throw new Error(`Reference ${refName} not found.`);
	}
	return packedValue;
};

export const removeDir = async (
	dirPath: string,
	retries = DEFAULT_RM_RETRIES,
) => {
	for (let attempt = 0; attempt <= retries; attempt += 1) {
		try {
			await rm(dirPath, { recursive: true, force: true });
			return;
		} catch (error) {
			const code = getErrnoCode(error);
			if (code !== "ENOTEMPTY" && code !== "EBUSY" && code !== "EPERM") {
				throw error;
			}
			if (attempt === retries) {
				throw error;
			}
			await new Promise((resolve) =>
				setTimeout(resolve, DEFAULT_RM_BACKOFF_MS * (attempt + 1)),
			);
		}
	}
};
