import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const src = (dir: string) =>
	fileURLToPath(new URL(`./src/${dir}`, import.meta.url));

export default defineConfig({
	test: {
		environment: "node",
		include: ["src/**/*.test.ts"],
		env: {
			LOG_LEVEL: "silent",
		},
	},
	resolve: {
		alias: [
			{ find: /^#cli\/(.*)$/, replacement: src("cli/$1") },
			{ find: /^#config\/(.*)$/, replacement: src("config/$1") },
			{ find: /^#config$/, replacement: src("config/index") },
			{ find: /^#core\/(.*)$/, replacement: src("$1") },
			{ find: /^#git\/(.*)$/, replacement: src("git/$1") },
			{ find: /^#mirror\/(.*)$/, replacement: src("mirror/$1") },
			{ find: /^#server\/(.*)$/, replacement: src("server/$1") },
		],
	},
});
