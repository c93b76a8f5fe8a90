/**
 * SCM error classes
 *
 * @module scm/errors
 */

import type { ScmError } from "./types.ts";

/**
 * Custom error class for subprocess failures
 */
export class ScmCommandError extends Error implements ScmError {
	code: "COMMAND_FAILED" | "COMMAND_TIMEOUT";
	command: string;
	args: string[];
	cause?: Error;
	context?: Record<string, unknown>;

	constructor(
		code: "COMMAND_FAILED" | "COMMAND_TIMEOUT",
		message: string,
		options: {
			command: string;
			args: string[];
			cause?: Error;
			context?: Record<string, unknown>;
		},
	) {
		super(message);
		this.name = "ScmCommandError";
		this.code = code;
		this.command = options.command;
		this.args = options.args;
		this.cause = options.cause;
		this.context = options.context;
	}
}

/**
 * Thrown out of a consumption loop once its abort signal has fired
 */
export class ScmAbortError extends Error implements ScmError {
	readonly code = "ABORTED" as const;
	cause?: Error;
	readonly context?: Record<string, unknown>;

	constructor(message = "SCM operation aborted", context?: Record<string, unknown>) {
		super(message);
		this.name = "ScmAbortError";
		this.context = context;
	}
}

/**
 * Check whether an unknown thrown value is an abort
 */
export function isAbortError(error: unknown): error is ScmAbortError {
	return error instanceof ScmAbortError;
}
