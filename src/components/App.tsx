import React, { useMemo, useRef } from "react";
import { Box, useApp, useInput, useStdout } from "ink";
import { ActionDispatcher } from "../lib/dispatcher.js";
import type { ApplicationCollaborators } from "../lib/macos.js";
import type { ApplicationName, SelectionState } from "../lib/selection.js";
import { useSelectionState } from "./hooks/useSelectionState.js";
import { resolveKeyAction } from "./keymap.js";
import { HeaderBar } from "./HeaderBar.js";
import { ApplicationListPanel } from "./ApplicationListPanel.js";
import { StatusLine } from "./StatusLine.js";
import type { AppVariant, KeyAction } from "./types.js";

// Header, list title and footer, with their borders.
const CHROME_ROWS = 10;
const MIN_LIST_ROWS = 5;

interface AppProps {
	state: SelectionState;
	collaborators: ApplicationCollaborators;
	variant?: AppVariant;
	tickMs?: number;
	onSubmit?: (name: ApplicationName) => void;
}

export function App({
	state,
	collaborators,
	variant = "browse",
	tickMs = 100,
	onSubmit,
}: AppProps) {
	const { exit } = useApp();
	const { stdout } = useStdout();
	const { refresh } = useSelectionState(state, tickMs);
	const dispatcher = useMemo(
		() => new ActionDispatcher(state, collaborators),
		[state, collaborators],
	);
	const busy = useRef(false);

	// OS calls are awaited one at a time; keys pressed meanwhile are dropped.
	const runAction = (action: () => Promise<void>) => {
		if (busy.current) return;
		busy.current = true;

		void action().then(
			() => {
				busy.current = false;
				refresh();
			},
			(error: unknown) => {
				busy.current = false;
				exit(error instanceof Error ? error : new Error(String(error)));
			},
		);
	};

	const handleAction = (action: KeyAction) => {
		switch (action.type) {
			case "quit":
				exit();
				return;
			case "navigate":
				state.advance(action.direction);
				break;
			case "edit":
				state.editQuery(action.edit);
				break;
			case "exitSearch":
				state.exitSearchMode();
				break;
			case "enterSearch":
				runAction(() =>
					state.enterSearchMode(() =>
						collaborators.scanInstalledApplications(),
					),
				);
				return;
			case "open": {
				const name = state.selectedName();
				if (name === undefined) return;
				runAction(async () => {
					await dispatcher.open(name);
					if (state.mode === "search") {
						state.exitSearchMode();
					}
				});
				return;
			}
			case "kill": {
				const name = state.selectedName();
				if (name === undefined) return;
				runAction(() => dispatcher.kill(name));
				return;
			}
			case "submit": {
				const name = state.selectedName();
				if (name === undefined) return;
				onSubmit?.(name);
				exit();
				return;
			}
			case "none":
				return;
		}
		refresh();
	};

	useInput((input, key) => {
		if (busy.current) return;
		handleAction(resolveKeyAction(input, key, state.mode, variant));
	});

	const apps = state.activeList();
	const maxRows = Math.max(MIN_LIST_ROWS, (stdout.rows ?? 24) - CHROME_ROWS);

	return (
		<Box flexDirection="column" paddingX={1}>
			<HeaderBar mode={state.mode} query={state.searchQuery} />
			<ApplicationListPanel
				apps={apps}
				selectedIndex={state.selectedIndex}
				mode={state.mode}
				maxRows={maxRows}
			/>
			<StatusLine
				mode={state.mode}
				variant={variant}
				status={state.status}
				appCount={apps.length}
			/>
		</Box>
	);
}
