import type { Key } from "ink";
import type { Direction, QueryEdit } from "../lib/selection.js";

/**
 * `browse` is the full running-apps UI; `launcher` is the search-only
 * picker behind `appdeck open` with no name.
 */
export type AppVariant = "browse" | "launcher";

export type KeyState = Pick<
	Key,
	| "upArrow"
	| "downArrow"
	| "return"
	| "escape"
	| "backspace"
	| "delete"
	| "tab"
	| "ctrl"
	| "meta"
>;

export type KeyAction =
	| { type: "none" }
	| { type: "quit" }
	| { type: "navigate"; direction: Direction }
	| { type: "open" }
	| { type: "kill" }
	| { type: "enterSearch" }
	| { type: "exitSearch" }
	| { type: "submit" }
	| { type: "edit"; edit: QueryEdit };
