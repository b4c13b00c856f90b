import chalk from "chalk";
import type { Config } from "../lib/config.js";
import { resolveIcon } from "../lib/icons.js";
import {
	createMacOSCollaborators,
	type ApplicationCollaborators,
} from "../lib/macos.js";

export const LIST_FORMATS = ["tui", "table", "json"] as const;

export type ListFormat = (typeof LIST_FORMATS)[number];

export function isListFormat(value: string): value is ListFormat {
	return LIST_FORMATS.some((format) => format === value);
}

export interface ListOptions {
	config: Config;
	format?: ListFormat;
	collaborators?: ApplicationCollaborators;
}

export async function listApplications({
	config,
	format = "tui",
	collaborators = createMacOSCollaborators(config),
}: ListOptions): Promise<void> {
	if (format === "tui") {
		const { launchBrowseTUI } = await import("../components/tui.js");
		await launchBrowseTUI(config, collaborators);
		return;
	}

	const running = await collaborators.listRunningApplications();

	if (format === "json") {
		console.log(JSON.stringify(running, null, 2));
		return;
	}

	if (running.length === 0) {
		console.log(chalk.yellow("No visible applications found."));
		return;
	}

	console.log(chalk.bold.green("Running Applications:"));
	console.log();
	for (const name of running) {
		console.log(`${resolveIcon(name)} ${name}`);
	}
}
