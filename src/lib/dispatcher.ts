import { MacOSOperationError } from "./exec.js";
import type { ApplicationCollaborators } from "./macos.js";
import type { ApplicationName, SelectionState } from "./selection.js";

/**
 * Runs open/quit requests for the interactive UI and reports the outcome
 * into the session state.
 */
export class ActionDispatcher {
	constructor(
		private readonly state: SelectionState,
		private readonly apps: ApplicationCollaborators,
	) {}

	/**
	 * Launch an application. A failure to issue the request propagates.
	 */
	async open(name: ApplicationName): Promise<void> {
		await this.apps.launchApplication(name);
		this.state.recordOpened(name);
		await this.refresh();
	}

	/**
	 * Ask an application to quit. A request the application rejects is
	 * reported in the status line; anything else propagates.
	 */
	async kill(name: ApplicationName): Promise<void> {
		try {
			await this.apps.quitApplication(name);
			this.state.recordKilled(name);
		} catch (error) {
			if (
				error instanceof MacOSOperationError &&
				error.code === "ACTION_REJECTED"
			) {
				this.state.recordFailed(name, error.stderr || error.message);
			} else {
				throw error;
			}
		}
		await this.refresh();
	}

	/**
	 * Re-query the running applications. Keeps the previous list if the
	 * query fails.
	 */
	async refresh(): Promise<boolean> {
		try {
			const running = await this.apps.listRunningApplications();
			this.state.refreshRunning(running);
			return true;
		} catch {
			return false;
		}
	}
}
