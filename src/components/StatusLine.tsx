import React from "react";
import { Box, Text } from "ink";
import figures from "figures";
import type { ActionStatus, Mode } from "../lib/selection.js";
import type { AppVariant } from "./types.js";

interface StatusLineProps {
	mode: Mode;
	variant: AppVariant;
	status: ActionStatus;
	appCount: number;
}

export const NORMAL_KEYBINDINGS =
	"↑/↓: Navigate   O: Open   K: Kill   /: Search   Q: Quit";
export const SEARCH_KEYBINDINGS =
	"↑/↓: Navigate   Enter: Open   Esc: Cancel   Backspace: Delete";

export function StatusLine({
	mode,
	variant,
	status,
	appCount,
}: StatusLineProps) {
	const getKeybindings = () =>
		mode === "search" || variant === "launcher"
			? SEARCH_KEYBINDINGS
			: NORMAL_KEYBINDINGS;

	const renderStatus = () => {
		switch (status.kind) {
			case "opened":
				return (
					<Text color="green">
						{figures.tick} <Text bold>{status.name}</Text> opened
					</Text>
				);
			case "killed":
				return (
					<Text color="red">
						{figures.cross} <Text bold>{status.name}</Text> terminated
					</Text>
				);
			case "failed":
				return (
					<Text color="red">
						{figures.warning} Could not quit <Text bold>{status.name}</Text>:{" "}
						{status.reason}
					</Text>
				);
			case "none":
				return <Text color="yellow">{getKeybindings()}</Text>;
		}
	};

	return (
		<Box borderStyle="single" paddingX={1}>
			{renderStatus()}
			<Box flexGrow={1} />
			<Text color="gray">
				{appCount} {appCount === 1 ? "application" : "applications"}
			</Text>
		</Box>
	);
}
