/**
 * Subprocess runner
 *
 * Spawns a version-control executable with child_process.spawn, collects
 * both output streams and enforces a timeout-and-terminate policy.
 *
 * @module scm/process/runner
 */

import { spawn } from "node:child_process";
import { bus } from "../../events/index.ts";
import { loggers } from "../../observability/index.ts";
import { ScmAbortError, ScmCommandError } from "../errors.ts";
import { err, ok, type ScmResult } from "../types.ts";

/**
 * Default timeout for subprocesses in milliseconds
 */
export const DEFAULT_COMMAND_TIMEOUT = 30_000;

/**
 * Delay between SIGTERM and SIGKILL for a timed out subprocess
 */
export const DEFAULT_KILL_GRACE = 5_000;

/**
 * Default environment variables for subprocesses
 */
export const DEFAULT_COMMAND_ENV: Record<string, string> = {
	// Disable pager for all commands
	GIT_PAGER: "",
	// Use English for consistent parsing
	LANG: "C",
	LC_ALL: "C",
	// Read commands leave the index alone, so they do not wake the control-path watcher
	GIT_OPTIONAL_LOCKS: "0",
};

/**
 * Options for running a subprocess
 */
export interface RunCommandOptions {
	/** Working directory */
	cwd: string;
	/** Timeout in milliseconds */
	timeout?: number;
	/** Delay between SIGTERM and SIGKILL once the timeout fires */
	killGraceMs?: number;
	/** Extra environment variables */
	env?: Record<string, string>;
	/** Terminates the subprocess when aborted */
	signal?: AbortSignal;
}

/**
 * Completed subprocess output
 */
export interface CommandOutput {
	/** Exit code */
	exitCode: number;
	stdout: string;
	stderr: string;
	/** Whether the timeout terminated the subprocess */
	timedOut: boolean;
	/** Execution duration in milliseconds */
	duration: number;
}

/**
 * Runs a command to completion; injectable so tests never spawn
 */
export type CommandRunner = (
	command: string,
	args: string[],
	options: RunCommandOptions,
) => Promise<ScmResult<CommandOutput, ScmCommandError | ScmAbortError>>;

/**
 * Execute a command using child_process.spawn
 *
 * Spawn failures, timeouts and aborts resolve as errors; a nonzero exit
 * code is a successful run.
 */
export const runCommand: CommandRunner = (command, args, options) => {
	const timeout = options.timeout ?? DEFAULT_COMMAND_TIMEOUT;
	const killGrace = options.killGraceMs ?? DEFAULT_KILL_GRACE;
	const { cwd, signal } = options;
	const env = {
		...process.env,
		...DEFAULT_COMMAND_ENV,
		...options.env,
	};

	const startTime = Date.now();
	bus.emit("scm:command:start", { command, args, cwd });
	loggers.process.debug({ command, args, cwd }, "Spawning subprocess");

	return new Promise((resolve) => {
		if (signal?.aborted) {
			resolve(err(new ScmAbortError("SCM operation aborted", { command, args })));
			return;
		}

		const child = spawn(command, args, {
			cwd,
			env,
			stdio: ["ignore", "pipe", "pipe"],
		});

		const stdout: Buffer[] = [];
		const stderr: Buffer[] = [];
		let timedOut = false;
		let aborted = false;
		let killTimer: ReturnType<typeof setTimeout> | undefined;

		const terminate = () => {
			child.kill("SIGTERM");
			// Force kill if SIGTERM doesn't work
			killTimer = setTimeout(() => {
				if (child.exitCode === null && child.signalCode === null) {
					child.kill("SIGKILL");
				}
			}, killGrace);
		};

		const timeoutId = setTimeout(() => {
			timedOut = true;
			loggers.process.warn({ command, args, cwd, timeout }, "Subprocess timed out, terminating");
			terminate();
		}, timeout);

		const onAbort = () => {
			aborted = true;
			terminate();
		};
		signal?.addEventListener("abort", onAbort, { once: true });

		const cleanup = () => {
			clearTimeout(timeoutId);
			if (killTimer) {
				clearTimeout(killTimer);
			}
			signal?.removeEventListener("abort", onAbort);
		};

		child.stdout.on("data", (data: Buffer) => {
			stdout.push(data);
		});

		child.stderr.on("data", (data: Buffer) => {
			stderr.push(data);
		});

		child.on("error", (error: Error) => {
			cleanup();
			const duration = Date.now() - startTime;

			resolve(
				err(
					new ScmCommandError("COMMAND_FAILED", `Failed to execute ${command}: ${error.message}`, {
						command,
						args,
						cause: error,
						context: { cwd, duration },
					}),
				),
			);
		});

		child.on("close", (exitCode: number | null) => {
			cleanup();
			const duration = Date.now() - startTime;
			const stderrText = Buffer.concat(stderr).toString("utf8");

			bus.emit("scm:command:complete", {
				command,
				args,
				cwd,
				exitCode: exitCode ?? 1,
				duration,
				timedOut,
			});

			if (aborted) {
				resolve(err(new ScmAbortError("SCM operation aborted", { command, args, duration })));
				return;
			}

			if (timedOut) {
				resolve(
					err(
						new ScmCommandError("COMMAND_TIMEOUT", `${command} timed out after ${timeout}ms`, {
							command,
							args,
							context: { cwd, duration, timeout, stderr: stderrText },
						}),
					),
				);
				return;
			}

			resolve(
				ok({
					exitCode: exitCode ?? 1,
					stdout: Buffer.concat(stdout).toString("utf8"),
					stderr: stderrText,
					timedOut: false,
					duration,
				}),
			);
		});
	});
};
