import chalk from "chalk";
import figures from "figures";
import type { Config } from "../lib/config.js";
import { MacOSOperationError } from "../lib/exec.js";
import { ApplicationFuzzySearch } from "../lib/fuzzy.js";
import {
	createMacOSCollaborators,
	type ApplicationCollaborators,
} from "../lib/macos.js";

export interface KillOptions {
	config: Config;
	name?: string;
	collaborators?: ApplicationCollaborators;
}

export type KillOutcome =
	| "killed"
	| "rejected"
	| "not-running"
	| "none-running"
	| "interactive";

/**
 * Quit a running application by name, or fall back to the interactive
 * browser when no name is given. A name that is not running is reported
 * and nothing is quit. An application that refuses to quit is reported
 * too; only a failure to send the request propagates.
 */
export async function killApplication({
	config,
	name,
	collaborators = createMacOSCollaborators(config),
}: KillOptions): Promise<KillOutcome> {
	if (name === undefined) {
		const { launchBrowseTUI } = await import("../components/tui.js");
		await launchBrowseTUI(config, collaborators);
		return "interactive";
	}

	const running = await collaborators.listRunningApplications();

	if (running.length === 0) {
		console.log(chalk.yellow("No running applications found."));
		return "none-running";
	}

	if (!running.includes(name)) {
		console.log(chalk.red("Application not running:"), chalk.cyan(name));

		const suggestions = new ApplicationFuzzySearch(running).search(name);
		if (suggestions.length > 0) {
			console.log(
				chalk.dim(`${figures.info} Did you mean:`),
				suggestions.map((suggestion) => chalk.cyan(suggestion)).join(", "),
			);
		}
		return "not-running";
	}

	console.log(chalk.red("Killing:"), chalk.cyan(name));
	try {
		await collaborators.quitApplication(name);
	} catch (error) {
		if (
			error instanceof MacOSOperationError &&
			error.code === "ACTION_REJECTED"
		) {
			console.log(
				chalk.yellow(`${figures.warning} Could not quit`),
				chalk.cyan(name),
				error.stderr || error.message,
			);
			return "rejected";
		}
		throw error;
	}
	return "killed";
}
