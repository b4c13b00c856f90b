#!/usr/bin/env node

import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import chalk from "chalk";
import figures from "figures";
import { loadConfig, type Config } from "./lib/config.js";
import {
	LIST_FORMATS,
	isListFormat,
	listApplications,
	type ListFormat,
} from "./commands/list.js";

async function main() {
	const cli = yargs(hideBin(process.argv))
		.scriptName("appdeck")
		.usage("$0 [command]")
		.example("$0", "Browse running applications")
		.example("$0 open", "Search installed applications and open one")
		.example("$0 open Safari", "Open Safari")
		.example("$0 kill Safari", "Quit Safari")
		.command(
			"list",
			"List running applications",
			(yargs) => {
				return yargs.option("format", {
					describe: "Output format",
					type: "string",
					choices: LIST_FORMATS,
					default: "tui",
				});
			},
			async (argv) => {
				await handleList(isListFormat(argv.format) ? argv.format : "tui");
			},
		)
		.command(
			"open [name]",
			"Open an application",
			(yargs) => {
				return yargs.positional("name", {
					describe: "Application name to open (without .app)",
					type: "string",
				});
			},
			async (argv) => {
				await handleOpen(argv.name);
			},
		)
		.command(
			"kill [name]",
			"Quit a running application",
			(yargs) => {
				return yargs.positional("name", {
					describe: "Application name to quit",
					type: "string",
				});
			},
			async (argv) => {
				await handleKill(argv.name);
			},
		)
		.help()
		.version()
		.demandCommand(0, 1, "", "Too many commands specified")
		.strict();

	const argv = await cli.parseAsync();

	if (argv._.length === 0) {
		await handleList("tui");
	}
}

function fail(error: unknown): never {
	console.error(
		chalk.red(figures.cross),
		"Error:",
		error instanceof Error ? error.message : error,
	);
	process.exit(1);
}

async function withConfig(run: (config: Config) => Promise<void>) {
	try {
		await run(await loadConfig());
	} catch (error) {
		fail(error);
	}
}

async function handleList(format: ListFormat) {
	await withConfig((config) => listApplications({ config, format }));
}

async function handleOpen(name?: string) {
	const { openApplication } = await import("./commands/open.js");
	await withConfig((config) => openApplication({ config, name }));
}

async function handleKill(name?: string) {
	const { killApplication } = await import("./commands/kill.js");
	await withConfig(async (config) => {
		await killApplication({ config, name });
	});
}

main().catch(fail);
