import React from "react";
import { Box, Text } from "ink";
import figures from "figures";
import { resolveIcon } from "../lib/icons.js";
import type { ApplicationName, Mode } from "../lib/selection.js";

interface ApplicationListPanelProps {
	apps: readonly ApplicationName[];
	selectedIndex: number;
	mode: Mode;
	maxRows: number;
}

export function getListTitle(mode: Mode, count: number): string {
	if (mode === "normal") {
		return "Running Applications";
	}
	return count === 0 ? "No matching applications" : "Matching Applications";
}

/**
 * Window of rows to draw so the selection stays on screen.
 */
export function getVisibleRange(
	length: number,
	selectedIndex: number,
	maxRows: number,
): { start: number; end: number } {
	if (length <= maxRows) {
		return { start: 0, end: length };
	}

	const half = Math.floor(maxRows / 2);
	const start = Math.min(Math.max(0, selectedIndex - half), length - maxRows);
	return { start, end: start + maxRows };
}

export function ApplicationListPanel({
	apps,
	selectedIndex,
	mode,
	maxRows,
}: ApplicationListPanelProps) {
	const { start, end } = getVisibleRange(apps.length, selectedIndex, maxRows);

	return (
		<Box flexDirection="column" borderStyle="single" paddingX={1}>
			<Text color="cyan" bold>
				{getListTitle(mode, apps.length)}
			</Text>
			<Box flexDirection="column" marginTop={1}>
				{apps.slice(start, end).map((name, offset) => {
					const index = start + offset;
					const isSelected = index === selectedIndex;

					return (
						<Box key={`${index}:${name}`}>
							<Text
								color={isSelected ? "yellow" : "white"}
								bold={isSelected}
							>
								{isSelected ? `${figures.pointer} ` : "  "}
								{resolveIcon(name)} {name}
							</Text>
						</Box>
					);
				})}
			</Box>
			{end < apps.length && (
				<Text color="gray">
					{figures.arrowDown} {apps.length - end} more
				</Text>
			)}
		</Box>
	);
}
