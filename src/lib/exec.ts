import { execFile, spawn } from "node:child_process";

/**
 * Execution options for OS commands.
 */
export interface ExecOptions {
	maxBuffer?: number;
	timeout?: number;
}

/**
 * Command execution result with enough context to build an error from.
 */
export interface ExecResult {
	stdout: string;
	stderr: string;
	command: string;
	exitCode: number;
}

export type MacOSErrorCode =
	| "COLLABORATOR_FAILURE"
	| "SCAN_FAILED"
	| "ACTION_REJECTED";

export class MacOSOperationError extends Error {
	constructor(
		message: string,
		public code: MacOSErrorCode,
		public stderr?: string,
		public command?: string,
		public exitCode?: number,
	) {
		super(message);
		this.name = "MacOSOperationError";
	}

	/**
	 * Create a MacOSOperationError from an execution result.
	 */
	static fromExecResult(
		message: string,
		result: ExecResult,
		code: MacOSErrorCode,
	): MacOSOperationError {
		return new MacOSOperationError(
			message,
			code,
			result.stderr,
			result.command,
			result.exitCode,
		);
	}
}

function formatCommand(file: string, args: string[]): string {
	return [file, ...args].join(" ");
}

/**
 * Run a program without a shell and collect its output.
 *
 * A non-zero exit still resolves, with `exitCode` set; callers decide what
 * that means. Rejects only when the program could not be run at all.
 */
export function runCommand(
	file: string,
	args: string[],
	options: ExecOptions = {},
): Promise<ExecResult> {
	const command = formatCommand(file, args);
	const maxBuffer = options.maxBuffer ?? 1024 * 1024 * 10; // 10MB default
	const timeout = options.timeout ?? 30000; // 30s default

	return new Promise((resolve, reject) => {
		execFile(
			file,
			args,
			{ encoding: "utf8", maxBuffer, timeout },
			(error, stdout, stderr) => {
				if (error && typeof error.code !== "number") {
					reject(
						new MacOSOperationError(
							`Failed to run ${command}: ${error.message}`,
							"COLLABORATOR_FAILURE",
							stderr.trim(),
							command,
						),
					);
					return;
				}

				resolve({
					stdout: stdout.trim(),
					stderr: stderr.trim(),
					command,
					exitCode: typeof error?.code === "number" ? error.code : 0,
				});
			},
		);
	});
}

/**
 * Start a program and return as soon as it is running, without waiting
 * for it to finish or reading its output.
 */
export function spawnDetached(file: string, args: string[]): Promise<void> {
	const command = formatCommand(file, args);

	return new Promise((resolve, reject) => {
		const child = spawn(file, args, { detached: true, stdio: "ignore" });

		child.once("spawn", () => {
			child.unref();
			resolve();
		});
		child.once("error", (error) => {
			reject(
				new MacOSOperationError(
					`Failed to run ${command}: ${error.message}`,
					"COLLABORATOR_FAILURE",
					undefined,
					command,
				),
			);
		});
	});
}
