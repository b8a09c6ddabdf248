import type { ZodError } from "zod";
import {
	JobListSchema,
	type MirrorJob,
	type MirrorSettings,
	SettingsSchema,
} from "#config/schema";
import {
	createMetadataResolver,
	resolveSecretValue,
	type SecretResolver,
} from "#config/secrets";
import { parseJson, readJobFile } from "#config/io";

export type { MirrorJob, MirrorSettings };

export const DEFAULT_JOB_ID = "default";
export const DEFAULT_SETTINGS: MirrorSettings = {
	port: 8080,
	workDir: ".",
	syncIntervalMs: 60000,
	staleAfterMs: 15 * 60 * 1000,
	gitTimeoutMs: 5 * 60 * 1000,
	logLevel: "info",
};

export type MirrorConfig = Readonly<
	MirrorSettings & {
		jobs: readonly Readonly<MirrorJob>[];
	}
>;

export type ConfigOverrides = Partial<MirrorSettings> & {
	configPath?: string;
};

export type LoadConfigOptions = {
	env?: NodeJS.ProcessEnv;
	overrides?: ConfigOverrides;
	secrets?: SecretResolver;
};

// Job keys match case-insensitively ("ID", "From", "HTTPCookie", ...)
const JOB_KEYS: Record<string, keyof MirrorJob> = {
	id: "id",
	from: "from",
	to: "to",
	httpcookie: "httpCookie",
	branch: "branch",
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const normalizeJobKeys = (input: unknown): unknown => {
	if (!isRecord(input)) {
		return input;
	}
	const result: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(input)) {
		const canonical = JOB_KEYS[key.toLowerCase()] ?? key;
		// An empty optional value means "not set"
		if ((canonical === "httpCookie" || canonical === "branch") && value === "") {
			continue;
		}
		result[canonical] = value;
	}
	return result;
};

const formatIssues = (error: ZodError, root: string) =>
	error.issues
		.map((issue) => `${[root, ...issue.path].join(".")} ${issue.message}`)
		.join("; ");

export const validateJobs = (input: unknown): MirrorJob[] => {
	if (!Array.isArray(input)) {
		throw new Error("Job list must be a JSON array.");
	}
	const parsed = JobListSchema.safeParse(input.map(normalizeJobKeys));
	if (!parsed.success) {
		throw new Error(
			`Job list does not match schema: ${formatIssues(parsed.error, "jobs")}.`,
		);
	}
	return parsed.data;
};

export const validateSettings = (input: unknown): MirrorSettings => {
	const parsed = SettingsSchema.safeParse(input);
	if (!parsed.success) {
		throw new Error(
			`Settings are invalid: ${formatIssues(parsed.error, "settings")}.`,
		);
	}
	return parsed.data;
};

const readIntEnv = (
	env: NodeJS.ProcessEnv,
	name: string,
): number | undefined => {
	const raw = env[name];
	if (raw === undefined || raw.trim() === "") {
		return undefined;
	}
	const value = Number(raw);
	if (!Number.isInteger(value)) {
		throw new Error(`${name} must be an integer, got '${raw}'.`);
	}
	return value;
};

const readRawJobs = async (
	env: NodeJS.ProcessEnv,
	overrides: ConfigOverrides,
	secrets: SecretResolver,
): Promise<unknown> => {
	const configPath = overrides.configPath ?? env.REPOS_FILE;
	if (configPath) {
		return readJobFile(configPath);
	}
	if (env.REPOS) {
		const value = await resolveSecretValue(env.REPOS, secrets);
		return parseJson(value, "REPOS");
	}
	if (env.FROM_REPO && env.TO_REPO) {
		return [{ id: DEFAULT_JOB_ID, from: env.FROM_REPO, to: env.TO_REPO }];
	}
	throw new Error(
		"REPOS environment variable must be set (or FROM_REPO and TO_REPO, or a config file).",
	);
};

const resolveJobSecrets = async (
	job: MirrorJob,
	secrets: SecretResolver,
): Promise<MirrorJob> => {
	const from = await resolveSecretValue(job.from, secrets);
	const to = await resolveSecretValue(job.to, secrets);
	if (!from || !to) {
		throw new Error(`Empty from or to for job '${job.id}' after resolution.`);
	}
	const resolved: MirrorJob = { ...job, from, to };
	if (job.httpCookie) {
		resolved.httpCookie = await resolveSecretValue(job.httpCookie, secrets);
	}
	return resolved;
};

/**
 * Builds the immutable daemon configuration. Every failure here is fatal to
 * startup; nothing is retried.
 */
export const loadConfig = async (
	options: LoadConfigOptions = {},
): Promise<MirrorConfig> => {
	const env = options.env ?? process.env;
	const overrides = options.overrides ?? {};
	const secrets = options.secrets ?? createMetadataResolver();

	const rawJobs = await readRawJobs(env, overrides, secrets);
	const validated = validateJobs(rawJobs);
	const jobs: MirrorJob[] = [];
	for (const job of validated) {
		jobs.push(Object.freeze(await resolveJobSecrets(job, secrets)));
	}

	const settings = validateSettings({
		port: overrides.port ?? readIntEnv(env, "PORT") ?? DEFAULT_SETTINGS.port,
		workDir: overrides.workDir ?? env.MIRROR_WORK_DIR ?? DEFAULT_SETTINGS.workDir,
		syncIntervalMs:
			overrides.syncIntervalMs ??
			readIntEnv(env, "MIRROR_SYNC_INTERVAL_MS") ??
			DEFAULT_SETTINGS.syncIntervalMs,
		staleAfterMs:
			overrides.staleAfterMs ??
			readIntEnv(env, "MIRROR_STALE_AFTER_MS") ??
			DEFAULT_SETTINGS.staleAfterMs,
		gitTimeoutMs:
			overrides.gitTimeoutMs ??
			readIntEnv(env, "MIRROR_GIT_TIMEOUT_MS") ??
			DEFAULT_SETTINGS.gitTimeoutMs,
		logLevel: overrides.logLevel ?? env.LOG_LEVEL ?? DEFAULT_SETTINGS.logLevel,
	});

	return Object.freeze({ ...settings, jobs: Object.freeze(jobs) });
};
