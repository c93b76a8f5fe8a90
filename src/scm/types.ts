/**
 * SCM Abstraction Layer Types
 *
 * Core records shared by every backend, the result helpers used at the
 * subprocess boundary, and the per-operation option bags.
 *
 * @module scm/types
 */

// ============================================================================
// Core Result Types
// ============================================================================

/**
 * Discriminated union for operation results
 * Provides type-safe success/failure handling
 */
export type ScmResult<T, E = ScmError> = { ok: true; value: T } | { ok: false; error: E };

/**
 * Base error type for SCM operations
 */
export interface ScmError {
	/** Error code for programmatic handling */
	code: ScmErrorCode;
	/** Human-readable error message */
	message: string;
	/** Original error if wrapped */
	cause?: Error;
	/** Additional context for debugging */
	context?: Record<string, unknown>;
}

/**
 * Error codes for SCM operations
 */
export type ScmErrorCode =
	| "COMMAND_FAILED"
	| "COMMAND_TIMEOUT"
	| "NOT_A_REPOSITORY"
	| "ABORTED"
	| "INVALID_CONFIG";

// ============================================================================
// Normalized Records
// ============================================================================

/**
 * Canonical change status of a path in a working tree
 */
export type FileStatus = "added" | "deleted" | "edited" | "renamed" | "untracked";

/**
 * Status of a single file, including the clean case
 */
export type FileStatusResult = FileStatus | "unchanged";

/**
 * One path's change in a working tree
 */
export interface FileChange {
	status: FileStatus;
	/** Absolute path (the original path for renames) */
	path: string;
	/** Absolute destination path, present only for renames */
	newPath?: string;
	/** Whether the change is staged, only set by backends with staging */
	staged?: boolean;
}

/**
 * A commit as reported by the tool
 */
export interface Commit {
	hash: string;
	author: string;
	date: string;
	/** First line of the commit message */
	summary: string;
	/** Remaining message body */
	message?: string;
}

/**
 * Blame record for one source line
 */
export interface BlameEntry {
	commit: string;
	author: string;
	date: string;
}

/**
 * Aggregate insert/delete counts of a working tree diff
 */
export interface DiffStats {
	inserts: number;
	deletes: number;
}

/**
 * Outcome of a mutating operation
 */
export interface ExecStatus {
	success: boolean;
	/** stderr, else stdout, else empty; empty on success */
	message: string;
}

/**
 * A value together with whether it came from the result cache
 */
export interface CachedResult<T> {
	value: T;
	cached: boolean;
}

// ============================================================================
// Operation Options
// ============================================================================

/**
 * Options accepted by every backend operation
 */
export interface OperationOptions {
	/** Aborts the subprocess and the consumption loop at the next yield point */
	signal?: AbortSignal;
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Create a successful result
 */
export function ok<T>(value: T): ScmResult<T, never> {
	return { ok: true, value };
}

/**
 * Create a failed result
 */
export function err<E extends ScmError>(error: E): ScmResult<never, E> {
	return { ok: false, error };
}

/**
 * Create an SCM error
 */
export function createScmError(
	code: ScmErrorCode,
	message: string,
	options?: { cause?: Error; context?: Record<string, unknown> },
): ScmError {
	return {
		code,
		message,
		cause: options?.cause,
		context: options?.context,
	};
}
