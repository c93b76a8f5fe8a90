/**
 * Completed-process handle
 *
 * @module scm/process/handle
 */

import { type ScmCommandError, ScmAbortError } from "../errors.ts";
import type { ScmResult } from "../types.ts";
import { Checkpoint } from "./cooperative.ts";
import type { CommandOutput } from "./runner.ts";

export type OutputStream = "stdout" | "stderr";

/**
 * Exit code reported when the executable could not be started
 */
export const EXIT_SPAWN_FAILED = 127;

/**
 * Exit code reported when the timeout terminated the subprocess
 */
export const EXIT_TIMED_OUT = 124;

/**
 * Exit code and output of a finished subprocess.
 *
 * Spawn failures and timeouts are folded in as nonzero exits whose stderr
 * carries the error message, so handlers only ever branch on the exit code.
 */
export class ProcessHandle {
	readonly command: string;
	readonly args: readonly string[];
	readonly exitCode: number;
	readonly timedOut: boolean;
	private readonly output: Record<OutputStream, string>;
	private readonly signal?: AbortSignal;

	constructor(
		command: string,
		args: readonly string[],
		output: Pick<CommandOutput, "exitCode" | "stdout" | "stderr" | "timedOut">,
		signal?: AbortSignal,
	) {
		this.command = command;
		this.args = args;
		this.exitCode = output.exitCode;
		this.timedOut = output.timedOut;
		this.output = { stdout: output.stdout, stderr: output.stderr };
		this.signal = signal;
	}

	/**
	 * Build a handle from a runner result; an abort is rethrown
	 */
	static fromResult(
		command: string,
		args: readonly string[],
		result: ScmResult<CommandOutput, ScmCommandError | ScmAbortError>,
		signal?: AbortSignal,
	): ProcessHandle {
		if (result.ok) {
			return new ProcessHandle(command, args, result.value, signal);
		}
		if (result.error instanceof ScmAbortError) {
			throw result.error;
		}
		const timedOut = result.error.code === "COMMAND_TIMEOUT";
		return new ProcessHandle(
			command,
			args,
			{
				exitCode: timedOut ? EXIT_TIMED_OUT : EXIT_SPAWN_FAILED,
				stdout: "",
				stderr: result.error.message,
				timedOut,
			},
			signal,
		);
	}

	get succeeded(): boolean {
		return this.exitCode === 0;
	}

	/**
	 * Entire stream as one string
	 */
	bufferedOutput(stream: OutputStream): string {
		return this.output[stream];
	}

	/**
	 * Lazy, forward-only sequence of `[index, line]` pairs (index from 1).
	 *
	 * Yields to the event loop after every `yieldEvery` lines consumed and
	 * throws ScmAbortError at a yield point once the signal fires.
	 */
	async *lineSequence(stream: OutputStream, yieldEvery = 50): AsyncGenerator<[number, string]> {
		const text = this.output[stream];
		const checkpoint = new Checkpoint(yieldEvery, this.signal);
		let start = 0;
		let index = 0;

		while (start < text.length) {
			let end = text.indexOf("\n", start);
			if (end === -1) {
				end = text.length;
			}
			let line = text.slice(start, end);
			if (line.endsWith("\r")) {
				line = line.slice(0, -1);
			}
			start = end + 1;
			index++;

			yield [index, line];
			await checkpoint.tick(index);
		}
	}
}
