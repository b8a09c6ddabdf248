import process from "node:process";

import { type ConfigOverrides, loadConfig, type MirrorConfig } from "#config";
import { createLogger } from "#core/logger";
import { createSupervisor } from "#mirror/supervisor";
import { startStatusServer } from "#server/serve";
import { InvalidArgumentError, parseArgs } from "./parse-args";
import { type CliOptions, type Command, ExitCode } from "./types";
import { symbols, ui } from "./ui";

export const CLI_NAME = "repo-mirror";

const HELP_TEXT = `
Usage: ${CLI_NAME} [command] [options]

Commands:
  serve   Mirror all configured jobs and serve /status (default)
  check   Validate the configuration and list jobs

Options:
  --config <path>         JSON job file (overrides REPOS)
  --port <n>              Status endpoint port (PORT, default 8080)
  --work-dir <path>       Working copy directory (MIRROR_WORK_DIR)
  --interval-ms <n>       Minimum spacing between syncs (default 60000)
  --stale-after-ms <n>    Staleness threshold (default 900000)
  --timeout-ms <n>        Timeout per git call (default 300000)
  --log-level <level>     fatal|error|warn|info|debug|trace|silent

Environment:
  REPOS                   JSON job list [{"ID","From","To","HTTPCookie"}]
  FROM_REPO, TO_REPO      Single legacy job with ID "default"
  Values prefixed with "metadata:" are read from the metadata server.
`;

const printHelp = () => {
	process.stdout.write(HELP_TEXT.trimStart());
};

const printError = (message: string) => {
	process.stderr.write(`${symbols.error} ${message}\n`);
};

const toOverrides = (options: CliOptions): ConfigOverrides => ({
	configPath: options.config,
	port: options.port,
	workDir: options.workDir,
	syncIntervalMs: options.intervalMs,
	staleAfterMs: options.staleAfterMs,
	gitTimeoutMs: options.timeoutMs,
	logLevel: options.logLevel,
});

const printJobs = (config: MirrorConfig) => {
	ui.field("Jobs", String(config.jobs.length));
	ui.field("Work dir", ui.path(config.workDir));
	for (const job of config.jobs) {
		ui.job(job);
	}
};

const serve = async (config: MirrorConfig) => {
	const logger = createLogger({ name: CLI_NAME, level: config.logLevel });
	const supervisor = createSupervisor({ config, logger });
	const controller = new AbortController();
	const server = await startStatusServer({
		port: config.port,
		logger,
		snapshots: supervisor.snapshots,
		staleAfterMs: config.staleAfterMs,
	});

	const stop = (signal: NodeJS.Signals) => {
		logger.info(`Received ${signal}, stopping all jobs`);
		controller.abort();
	};
	process.once("SIGINT", stop);
	process.once("SIGTERM", stop);

	logger.info(`Mirroring ${config.jobs.length} job(s)`);
	await supervisor.start(controller.signal);
	await server.close();
	logger.info("All jobs stopped");
};

const runCommand = async (command: Command, options: CliOptions) => {
	const config = await loadConfig({ overrides: toOverrides(options) });
	if (command === "check") {
		printJobs(config);
		ui.line(`${symbols.success} Configuration is valid`);
		return;
	}
	await serve(config);
};

/**
 * The main entry point of the CLI
 */
export async function main(argv = process.argv): Promise<void> {
	let parsed: ReturnType<typeof parseArgs>;
	try {
		parsed = parseArgs(argv);
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		printError(`${CLI_NAME}: ${message}`);
		if (error instanceof InvalidArgumentError) {
			printHelp();
		}
		process.exitCode = ExitCode.InvalidArgument;
		return;
	}

	if (parsed.help) {
		printHelp();
		return;
	}

	try {
		await runCommand(parsed.command ?? "serve", parsed.options);
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		printError(message);
		process.exitCode = ExitCode.FatalError;
	}
}
