import React from "react";
import { Box, Text } from "ink";
import type { Mode } from "../lib/selection.js";

interface HeaderBarProps {
	mode: Mode;
	query: string;
}

export function HeaderBar({ mode, query }: HeaderBarProps) {
	return (
		<Box borderStyle="single" justifyContent="center" paddingX={1}>
			{mode === "normal" ? (
				<Text color="green" bold>
					Running Applications
				</Text>
			) : (
				<Text>
					<Text color="green" bold>
						Search Applications:{" "}
					</Text>
					<Text color="yellow" bold>
						{query}
					</Text>
					<Text color="white" bold>
						_
					</Text>
				</Text>
			)}
		</Box>
	);
}
