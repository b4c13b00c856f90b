import { describe, it, expect, vi, beforeEach } from "vitest";
import chalk from "chalk";
import {
	ALT_SCREEN_OFF,
	ALT_SCREEN_ON,
	launchBrowseTUI,
	launchSearchTUI,
	withAlternateScreen,
} from "./tui.js";
import { parseConfig } from "../lib/config.js";
import { MacOSOperationError } from "../lib/exec.js";
import { createCollaborators } from "../test/helpers.js";

function fakeTerminal(isTTY: boolean) {
	return { isTTY, write: vi.fn((_chunk: string) => true) };
}

describe("TUI launcher", () => {
	beforeEach(() => {
		vi.clearAllMocks();
	});

	describe("withAlternateScreen", () => {
		it("should enter and leave the alternate screen around the task", async () => {
			const terminal = fakeTerminal(true);

			const result = await withAlternateScreen(terminal, true, async () => {
				expect(terminal.write).toHaveBeenCalledWith(ALT_SCREEN_ON);
				return "done";
			});

			expect(result).toBe("done");
			expect(terminal.write).toHaveBeenLastCalledWith(ALT_SCREEN_OFF);
		});

		it("should restore the screen when the task fails", async () => {
			const terminal = fakeTerminal(true);

			await expect(
				withAlternateScreen(terminal, true, () =>
					Promise.reject(new Error("session aborted")),
				),
			).rejects.toThrow("session aborted");

			expect(terminal.write.mock.calls).toEqual([
				[ALT_SCREEN_ON],
				[ALT_SCREEN_OFF],
			]);
		});

		it("should leave a non-terminal output alone", async () => {
			const terminal = fakeTerminal(false);

			await withAlternateScreen(terminal, true, () => Promise.resolve());

			expect(terminal.write).not.toHaveBeenCalled();
		});

		it("should respect the alternate screen setting", async () => {
			const terminal = fakeTerminal(true);

			await withAlternateScreen(terminal, false, () => Promise.resolve());

			expect(terminal.write).not.toHaveBeenCalled();
		});
	});

	describe("launchBrowseTUI", () => {
		it("should print a message instead of an empty list", async () => {
			const collaborators = createCollaborators({
				listRunningApplications: vi.fn(() => Promise.resolve([])),
			});

			await launchBrowseTUI(parseConfig({}), collaborators);

			expect(console.log).toHaveBeenCalledWith(
				chalk.yellow("No visible applications found."),
			);
		});

		it("should fail when the running applications cannot be listed", async () => {
			const collaborators = createCollaborators({
				listRunningApplications: vi.fn(() =>
					Promise.reject(
						new MacOSOperationError("osascript failed", "COLLABORATOR_FAILURE"),
					),
				),
			});

			await expect(
				launchBrowseTUI(parseConfig({}), collaborators),
			).rejects.toThrow("osascript failed");
		});
	});

	describe("launchSearchTUI", () => {
		it("should fail before drawing when the scan fails", async () => {
			const collaborators = createCollaborators({
				scanInstalledApplications: vi.fn(() =>
					Promise.reject(new MacOSOperationError("find failed", "SCAN_FAILED")),
				),
			});

			await expect(
				launchSearchTUI(parseConfig({}), collaborators),
			).rejects.toMatchObject({ code: "SCAN_FAILED" });
		});
	});
});
