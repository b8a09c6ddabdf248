import pino from "pino";

export type LogLevel =
	| "fatal"
	| "error"
	| "warn"
	| "info"
	| "debug"
	| "trace"
	| "silent";

const LOG_LEVELS: readonly LogLevel[] = [
	"fatal",
	"error",
	"warn",
	"info",
	"debug",
	"trace",
	"silent",
];

export const isLogLevel = (value: unknown): value is LogLevel =>
	typeof value === "string" && LOG_LEVELS.some((level) => level === value);

export type LoggerOptions = {
	name: string;
	level?: LogLevel;
	pretty?: boolean;
	/** Where JSON lines go instead of stdout; disables pretty printing. */
	destination?: pino.DestinationStream;
};

const resolveLogLevel = (): LogLevel => {
	const envLevel = process.env.LOG_LEVEL;
	return isLogLevel(envLevel) ? envLevel : "info";
};

// pino-pretty runs in a worker thread; only use it on an interactive terminal
const shouldPrettyPrint = () =>
	process.env.NODE_ENV !== "production" && Boolean(process.stdout.isTTY);

export const createLogger = (options: LoggerOptions): pino.Logger => {
	const base = {
		name: options.name,
		level: options.level ?? resolveLogLevel(),
	};
	if (options.destination) {
		return pino(base, options.destination);
	}
	const pretty = options.pretty ?? shouldPrettyPrint();
	return pino({
		...base,
		transport: pretty
			? {
					target: "pino-pretty",
					options: {
						colorize: true,
						translateTime: "HH:MM:ss",
						ignore: "pid,hostname",
					},
				}
			: undefined,
	});
};

export type { Logger } from "pino";
