import chalk from "chalk";
import type { Config } from "../lib/config.js";
import {
	createMacOSCollaborators,
	type ApplicationCollaborators,
} from "../lib/macos.js";

export interface OpenOptions {
	config: Config;
	name?: string;
	collaborators?: ApplicationCollaborators;
}

/**
 * Open an application by name, or pick one interactively when no name is
 * given.
 */
export async function openApplication({
	config,
	name,
	collaborators = createMacOSCollaborators(config),
}: OpenOptions): Promise<void> {
	let target = name;

	if (target === undefined) {
		const { launchSearchTUI } = await import("../components/tui.js");
		target = await launchSearchTUI(config, collaborators);
		if (target === undefined) {
			return;
		}
	}

	console.log(chalk.green("Opening:"), chalk.cyan(target));
	await collaborators.launchApplication(target);
}
