import React, { type ReactElement } from "react";
import { render } from "ink";
import chalk from "chalk";
import type { Config } from "../lib/config.js";
import {
	createMacOSCollaborators,
	type ApplicationCollaborators,
} from "../lib/macos.js";
import { SelectionState, type ApplicationName } from "../lib/selection.js";
import { App } from "./App.js";

// Alternate screen buffer (fullscreen, like vim/htop).
export const ALT_SCREEN_ON = "\x1B[?1049h\x1B[H";
export const ALT_SCREEN_OFF = "\x1B[?1049l";

export interface TerminalOutput {
	isTTY?: boolean;
	write(chunk: string): boolean;
}

/**
 * Run `task` on the alternate screen buffer and switch back when it
 * settles, whether it resolves or rejects. Does nothing special when the
 * output is not a terminal.
 */
export async function withAlternateScreen<T>(
	output: TerminalOutput,
	enabled: boolean,
	task: () => Promise<T>,
): Promise<T> {
	const active = enabled && output.isTTY === true;

	if (active) {
		output.write(ALT_SCREEN_ON);
	}
	try {
		return await task();
	} finally {
		if (active) {
			output.write(ALT_SCREEN_OFF);
		}
	}
}

/**
 * Take over the terminal for one interactive flow. Raw mode and the screen
 * are handed back on every exit path, including a flow that exits with an
 * error.
 */
export async function runInteractive(
	node: ReactElement,
	alternateScreen = true,
): Promise<void> {
	await withAlternateScreen(process.stdout, alternateScreen, async () => {
		const instance = render(node);
		try {
			await instance.waitUntilExit();
		} finally {
			instance.unmount();
		}
	});
}

/**
 * Browse running applications. Resolves when the user quits.
 */
export async function launchBrowseTUI(
	config: Config,
	collaborators: ApplicationCollaborators = createMacOSCollaborators(config),
): Promise<void> {
	const running = await collaborators.listRunningApplications();

	if (running.length === 0) {
		console.log(chalk.yellow("No visible applications found."));
		return;
	}

	const state = new SelectionState(running, {
		statusTicks: config.tui.statusTicks,
	});

	await runInteractive(
		<App
			state={state}
			collaborators={collaborators}
			variant="browse"
			tickMs={config.tui.tickMs}
		/>,
		config.tui.alternateScreen,
	);
}

/**
 * Pick an installed application. Resolves with the chosen name, or
 * undefined when the picker was cancelled.
 */
export async function launchSearchTUI(
	config: Config,
	collaborators: ApplicationCollaborators = createMacOSCollaborators(config),
): Promise<ApplicationName | undefined> {
	const state = new SelectionState([], {
		statusTicks: config.tui.statusTicks,
	});
	await state.enterSearchMode(() => collaborators.scanInstalledApplications());

	const selection: { name?: ApplicationName } = {};

	await runInteractive(
		<App
			state={state}
			collaborators={collaborators}
			variant="launcher"
			tickMs={config.tui.tickMs}
			onSubmit={(name) => {
				selection.name = name;
			}}
		/>,
		config.tui.alternateScreen,
	);

	return selection.name;
}
