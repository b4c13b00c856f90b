import { readFileSync } from "node:fs";
import { z } from "zod";

export const DEFAULT_ICON = "📱";

const iconTableSchema = z.array(z.tuple([z.string().min(1), z.string()]));

export type IconTable = z.infer<typeof iconTableSchema>;

/**
 * Load the ordered pattern/glyph table shipped in `data/icons.json`.
 * The path resolves the same from `src/lib` and from `dist/lib`.
 */
export function loadIconTable(
	url: URL = new URL("../../data/icons.json", import.meta.url),
): IconTable {
	const raw: unknown = JSON.parse(readFileSync(url, "utf8"));
	return iconTableSchema.parse(raw);
}

let defaultTable: IconTable | undefined;

function getDefaultTable(): IconTable {
	defaultTable ??= loadIconTable();
	return defaultTable;
}

/**
 * Resolve the display glyph for an application name.
 *
 * The first pattern contained in the name wins, so more specific entries
 * must come before generic ones.
 */
export function resolveIcon(
	name: string,
	table: IconTable = getDefaultTable(),
): string {
	for (const [pattern, icon] of table) {
		if (name.includes(pattern)) {
			return icon;
		}
	}
	return DEFAULT_ICON;
}
