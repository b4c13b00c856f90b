import type { Mode } from "../lib/selection.js";
import type { AppVariant, KeyAction, KeyState } from "./types.js";

const NONE: KeyAction = { type: "none" };

/**
 * Map one key event to the transition it triggers for the given mode.
 */
export function resolveKeyAction(
	input: string,
	key: KeyState,
	mode: Mode,
	variant: AppVariant,
): KeyAction {
	if (key.ctrl && input === "c") {
		return { type: "quit" };
	}

	if (key.upArrow) {
		return { type: "navigate", direction: "previous" };
	}

	if (key.downArrow) {
		return { type: "navigate", direction: "next" };
	}

	if (mode === "search") {
		return resolveSearchKey(input, key, variant);
	}

	if (key.escape) {
		return { type: "quit" };
	}

	switch (input) {
		case "q":
		case "Q":
			return { type: "quit" };
		case "o":
		case "O":
			return { type: "open" };
		case "k":
		case "K":
			return { type: "kill" };
		case "/":
			return { type: "enterSearch" };
		default:
			return NONE;
	}
}

function resolveSearchKey(
	input: string,
	key: KeyState,
	variant: AppVariant,
): KeyAction {
	if (key.escape) {
		return variant === "launcher" ? { type: "quit" } : { type: "exitSearch" };
	}

	if (key.return) {
		return variant === "launcher" ? { type: "submit" } : { type: "open" };
	}

	// Most terminals send DEL for the backspace key, which Ink reports as delete.
	if (key.backspace || key.delete) {
		return { type: "edit", edit: { type: "backspace" } };
	}

	if (input && !key.ctrl && !key.meta && !key.tab) {
		return { type: "edit", edit: { type: "append", char: input } };
	}

	return NONE;
}
