import path from "node:path";
import { defineBuildConfig } from "unbuild";

export default defineBuildConfig({
	entries: [
		{ input: "src/cli", name: "cli" },
		{ input: "src/index", name: "index" },
	],
	declaration: false,
	clean: true,
	sourcemap: true,
	rollup: {
		emitCJS: false,
		alias: {
			entries: [
				{
					find: /^#cli\/(.*)$/,
					replacement: path.resolve("src/cli/$1"),
				},
				{
					find: /^#config\/(.*)$/,
					replacement: path.resolve("src/config/$1"),
				},
				{
					find: "#config",
					replacement: path.resolve("src/config/index"),
				},
				{
					find: /^#core\/(.*)$/,
					replacement: path.resolve("src/$1"),
				},
				{
					find: /^#git\/(.*)$/,
					replacement: path.resolve("src/git/$1"),
				},
				{
					find: /^#mirror\/(.*)$/,
					replacement: path.resolve("src/mirror/$1"),
				},
				{
					find: /^#server\/(.*)$/,
					replacement: path.resolve("src/server/$1"),
				},
			],
		},
		inlineDependencies: ["picocolors"],
	},
});
