import { stripVTControlCharacters } from "node:util";
import { vi } from "vitest";
import type { ApplicationCollaborators } from "../lib/macos.js";

export const keys = {
	up: "\u001B[A",
	down: "\u001B[B",
	enter: "\r",
	escape: "\u001B",
	backspace: "\u007F",
};

export function delay(ms = 50): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Last rendered frame without colour codes. */
export function plain(frame: string | undefined): string {
	return stripVTControlCharacters(frame ?? "");
}

export function createCollaborators(
	overrides: Partial<ApplicationCollaborators> = {},
): ApplicationCollaborators {
	return {
		listRunningApplications: vi.fn(() => Promise.resolve(["Finder", "Safari"])),
		scanInstalledApplications: vi.fn(() => Promise.resolve([])),
		launchApplication: vi.fn(() => Promise.resolve()),
		quitApplication: vi.fn(() => Promise.resolve()),
		...overrides,
	};
}
