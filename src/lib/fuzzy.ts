import Fuse from "fuse.js";
import type { ApplicationName } from "./selection.js";

export interface FuzzySearchOptions {
	threshold?: number;
	limit?: number;
}

/**
 * Ranks application names against a possibly mistyped name. Only used for
 * "did you mean" hints; the interactive filter is a plain substring match.
 */
export class ApplicationFuzzySearch {
	private fuse: Fuse<ApplicationName>;
	private limit: number;

	constructor(names: ApplicationName[], options: FuzzySearchOptions = {}) {
		this.limit = options.limit ?? 3;
		this.fuse = new Fuse(names, {
			threshold: options.threshold ?? 0.4,
			ignoreLocation: true,
		});
	}

	search(query: string): ApplicationName[] {
		if (!query) {
			return [];
		}

		return this.fuse
			.search(query, { limit: this.limit })
			.map((result) => result.item);
	}
}
