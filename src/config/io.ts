import { access, readFile } from "node:fs/promises";
import path from "node:path";

const exists = async (target: string) => {
	try {
		await access(target);
		return true;
	} catch {
		return false;
	}
};

export const resolveConfigPath = (configPath: string) =>
	path.resolve(process.cwd(), configPath);

export const parseJson = (raw: string, label: string): unknown => {
	try {
		return JSON.parse(raw);
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		throw new Error(`Invalid JSON in ${label}: ${message}`);
	}
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Reads a job file holding either a bare job array or `{ "jobs": [...] }`.
 */
export const readJobFile = async (configPath: string): Promise<unknown> => {
	const resolvedPath = resolveConfigPath(configPath);
	if (!(await exists(resolvedPath))) {
		throw new Error(`Config not found at ${resolvedPath}.`);
	}
	const raw = await readFile(resolvedPath, "utf8");
	const parsed = parseJson(raw, resolvedPath);
	if (isRecord(parsed) && "jobs" in parsed) {
		return parsed.jobs;
	}
	return parsed;
};
