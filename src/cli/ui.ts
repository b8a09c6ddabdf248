import path from "node:path";
import pc from "picocolors";

import type { MirrorJob } from "#config";
import { redactRepoUrl } from "#git/redact";

export const symbols = {
	error: pc.red("✖"),
	success: pc.green("✔"),
	arrow: pc.dim("->"),
};

const write = (text: string) => {
	process.stdout.write(`${text}\n`);
};

export const ui = {
	path: (value: string) => {
		const rel = path.relative(process.cwd(), value);
		return rel.length > 0 && rel.length < value.length ? rel : value;
	},

	line: (text = "") => write(text),

	field: (label: string, value: string) => {
		write(`${pc.blue("ℹ")} ${label.padEnd(10)} ${value}`);
	},

	// Endpoints only ever leave the process with credentials masked
	job: (job: Readonly<MirrorJob>) => {
		const extras = [
			job.branch ? `branch ${job.branch}` : null,
			job.httpCookie ? "cookie" : null,
		].filter((value) => value !== null);
		const suffix = extras.length > 0 ? ` ${pc.dim(`(${extras.join(", ")})`)}` : "";
		write(
			`  ${symbols.success} ${pc.bold(job.id)} ${pc.blue(redactRepoUrl(job.from))} ${symbols.arrow} ${pc.magenta(redactRepoUrl(job.to))}${suffix}`,
		);
	},
};
