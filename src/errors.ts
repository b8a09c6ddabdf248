export type ErrnoException = NodeJS.ErrnoException;

export const isErrnoException = (error: unknown): error is ErrnoException =>
	error instanceof Error &&
	"code" in error &&
	(typeof error.code === "string" ||
		typeof error.code === "number" ||
		error.code === undefined);

export const getErrnoCode = (error: unknown): string | undefined =>
	isErrnoException(error) && typeof error.code === "string"
		? error.code
		: undefined;

export const isAbortError = (error: unknown): boolean =>
	error instanceof Error && error.name === "AbortError";

export const toErrorMessage = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);

/**
 * Failure of a single git invocation. `output` holds the combined
 * stdout/stderr text, already trimmed.
 */
export class GitCommandError extends Error {
	readonly command: string;
	readonly output: string;
	readonly exitCode: number | undefined;
	readonly timedOut: boolean;
	readonly cancelled: boolean;

	constructor(params: {
		command: string;
		output: string;
		message: string;
		exitCode?: number;
		timedOut?: boolean;
		cancelled?: boolean;
	}) {
		super(params.message);
		this.name = "GitCommandError";
		this.command = params.command;
		this.output = params.output;
		this.exitCode = params.exitCode;
		this.timedOut = params.timedOut ?? false;
		this.cancelled = params.cancelled ?? false;
	}
}
