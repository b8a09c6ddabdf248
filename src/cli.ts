#!/usr/bin/env node

import { main } from "#cli/index";

main().catch((error) => {
	const message = error instanceof Error ? error.message : String(error);
	process.stderr.write(`repo-mirror: ${message}\n`);
	process.exitCode = 1;
});
