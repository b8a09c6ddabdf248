import process from "node:process";
import cac from "cac";

import { isLogLevel } from "#core/logger";
import type { CliOptions, Command, ParsedArgs } from "./types";

const COMMANDS: readonly Command[] = ["serve", "check"];

export class InvalidArgumentError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "InvalidArgumentError";
	}
}

const isCommand = (value: unknown): value is Command =>
	typeof value === "string" && COMMANDS.some((command) => command === value);

const readString = (value: unknown, flag: string) => {
	if (value === undefined) return undefined;
	if (typeof value !== "string" || value.length === 0) {
		throw new InvalidArgumentError(`${flag} expects a value.`);
	}
	return value;
};

const readPositiveInt = (value: unknown, flag: string) => {
	if (value === undefined) return undefined;
	const numberValue = Number(value);
	if (!Number.isInteger(numberValue) || numberValue < 1) {
		throw new InvalidArgumentError(`${flag} must be a positive integer.`);
	}
	return numberValue;
};

const buildOptions = (raw: Record<string, unknown>): CliOptions => {
	const logLevel = raw.logLevel;
	if (logLevel !== undefined && !isLogLevel(logLevel)) {
		throw new InvalidArgumentError(
			`--log-level must be one of fatal, error, warn, info, debug, trace, silent.`,
		);
	}
	const options: CliOptions = {
		config: readString(raw.config, "--config"),
		port: readPositiveInt(raw.port, "--port"),
		workDir: readString(raw.workDir, "--work-dir"),
		intervalMs: readPositiveInt(raw.intervalMs, "--interval-ms"),
		staleAfterMs: readPositiveInt(raw.staleAfterMs, "--stale-after-ms"),
		timeoutMs: readPositiveInt(raw.timeoutMs, "--timeout-ms"),
		logLevel,
	};
	if (options.port !== undefined && options.port > 65535) {
		throw new InvalidArgumentError("--port must be at most 65535.");
	}
	return options;
};

export const parseArgs = (argv = process.argv): ParsedArgs => {
	const cli = cac("repo-mirror");

	cli
		.option("--config <path>", "Path to a JSON job file")
		.option("--port <n>", "Port of the status endpoint")
		.option("--work-dir <path>", "Directory holding the working copies")
		.option("--interval-ms <n>", "Minimum spacing between sync iterations")
		.option("--stale-after-ms <n>", "Age after which a job counts as stale")
		.option("--timeout-ms <n>", "Timeout for each git invocation")
		.option("--log-level <level>", "Log level")
		.option("-h, --help", "Display help");

	cli.command("serve", "Mirror all configured jobs and serve /status");
	cli.command("check", "Validate the configuration and list jobs");

	const result = cli.parse(argv, { run: false });
	const matched = cli.matchedCommandName;
	if (matched === undefined && result.args.length > 0) {
		throw new InvalidArgumentError(`Unknown command '${result.args[0]}'.`);
	}
	if (matched !== undefined && result.args.length > 0) {
		throw new InvalidArgumentError("Unexpected arguments.");
	}
	return {
		command: isCommand(matched) ? matched : null,
		options: buildOptions(result.options),
		help: Boolean(result.options.help),
	};
};
