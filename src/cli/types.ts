import type { LogLevel } from "#core/logger";

export type CliOptions = {
	config?: string;
	port?: number;
	workDir?: string;
	intervalMs?: number;
	staleAfterMs?: number;
	timeoutMs?: number;
	logLevel?: LogLevel;
};

export type Command = "serve" | "check";

export type ParsedArgs = {
	command: Command | null;
	options: CliOptions;
	help: boolean;
};

/** Process exit codes of the CLI. */
export const ExitCode = {
	Success: 0,
	FatalError: 1,
	InvalidArgument: 9,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];
