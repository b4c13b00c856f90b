import {
	MacOSOperationError,
	runCommand,
	spawnDetached,
	type ExecResult,
} from "./exec.js";
import type { ApplicationName } from "./selection.js";

export { MacOSOperationError } from "./exec.js";

/**
 * The OS facilities the interactive UI and the commands depend on.
 */
export interface ApplicationCollaborators {
	listRunningApplications(): Promise<ApplicationName[]>;
	scanInstalledApplications(): Promise<ApplicationName[]>;
	launchApplication(name: ApplicationName): Promise<void>;
	quitApplication(name: ApplicationName): Promise<void>;
}

export interface ScanOptions {
	applicationsDir?: string;
	scanDepth?: number;
}

export const DEFAULT_APPLICATIONS_DIR = "/Applications";
export const DEFAULT_SCAN_DEPTH = 2;

const RUNNING_APPS_SCRIPT =
	'tell application "System Events" to get name of (processes where background only is false)';

/**
 * Escape a value for use inside an AppleScript string literal.
 */
export function escapeAppleScriptString(value: string): string {
	return value.replace(/\\/g, "\\\\").replace(/"/g, '\\"');
}

/**
 * Parse the list AppleScript prints for a `get name of processes` query,
 * e.g. `Finder, Safari, Mail`.
 */
export function parseRunningApplications(output: string): ApplicationName[] {
	const trimmed = output.trim().replace(/^\{/, "").replace(/\}$/, "").trim();
	if (trimmed === "") {
		return [];
	}

	return trimmed
		.split(", ")
		.map((name) => name.trim().replace(/^"+|"+$/g, ""))
		.filter((name) => name !== "");
}

/**
 * Turn `find` output into display names by stripping the directory prefix
 * and the `.app` bundle suffix.
 */
export function parseInstalledApplications(
	output: string,
	applicationsDir: string = DEFAULT_APPLICATIONS_DIR,
): ApplicationName[] {
	const prefix = `${applicationsDir.replace(/\/+$/, "")}/`;

	return output
		.split("\n")
		.map((line) => line.trim())
		.filter((line) => line !== "")
		.map((line) => {
			const withoutPrefix = line.startsWith(prefix)
				? line.slice(prefix.length)
				: line;
			return withoutPrefix.endsWith(".app")
				? withoutPrefix.slice(0, -".app".length)
				: withoutPrefix;
		})
		.filter((name) => name !== "");
}

/**
 * Names of the applications currently visible to the user.
 */
export async function listRunningApplications(): Promise<ApplicationName[]> {
	const result = await runCommand("osascript", ["-e", RUNNING_APPS_SCRIPT]);

	if (result.exitCode !== 0) {
		throw MacOSOperationError.fromExecResult(
			`Failed to list running applications: ${result.stderr || "osascript exited with code " + result.exitCode}`,
			result,
			"COLLABORATOR_FAILURE",
		);
	}

	return parseRunningApplications(result.stdout);
}

/**
 * Application bundles found under the applications directory.
 */
export async function scanInstalledApplications({
	applicationsDir = DEFAULT_APPLICATIONS_DIR,
	scanDepth = DEFAULT_SCAN_DEPTH,
}: ScanOptions = {}): Promise<ApplicationName[]> {
	let result: ExecResult;
	try {
		result = await runCommand("find", [
			applicationsDir,
			"-maxdepth",
			String(scanDepth),
			"-name",
			"*.app",
		]);
	} catch (error) {
		if (error instanceof MacOSOperationError) {
			throw new MacOSOperationError(
				`Failed to list installed applications: ${error.message}`,
				"SCAN_FAILED",
				error.stderr,
				error.command,
			);
		}
		throw error;
	}

	// find exits non-zero on unreadable subdirectories but still prints the
	// bundles it could reach.
	if (result.exitCode !== 0 && result.stdout === "") {
		throw MacOSOperationError.fromExecResult(
			`Failed to list installed applications in ${applicationsDir}`,
			result,
			"SCAN_FAILED",
		);
	}

	return parseInstalledApplications(result.stdout, applicationsDir);
}

/**
 * Ask Launch Services to open an application. Does not wait for the
 * application to start.
 */
export async function launchApplication(name: ApplicationName): Promise<void> {
	await spawnDetached("open", ["-a", name]);
}

/**
 * Ask a running application to quit and wait for the request to finish.
 */
export async function quitApplication(name: ApplicationName): Promise<void> {
	const result = await runCommand("osascript", [
		"-e",
		`tell application "${escapeAppleScriptString(name)}" to quit`,
	]);

	if (result.exitCode !== 0) {
		throw MacOSOperationError.fromExecResult(
			`Failed to quit ${name}: ${result.stderr || "osascript exited with code " + result.exitCode}`,
			result,
			"ACTION_REJECTED",
		);
	}
}

export function createMacOSCollaborators(
	options: ScanOptions = {},
): ApplicationCollaborators {
	return {
		listRunningApplications,
		scanInstalledApplications: () => scanInstalledApplications(options),
		launchApplication,
		quitApplication,
	};
}
