/**
 * Status normalization
 *
 * Maps each tool's raw status vocabulary onto the canonical FileStatus set.
 * Tokens outside a vocabulary map to undefined and are skipped by callers.
 *
 * @module scm/status
 */

import type { FileStatus, FileStatusResult } from "./types.ts";

/**
 * `git status --short` codes
 */
export const GIT_STATUS_MAP: Readonly<Record<string, FileStatus>> = {
	A: "added",
	D: "deleted",
	M: "edited",
	R: "renamed",
	"??": "untracked",
};

/**
 * `fossil changes` labels
 */
export const FOSSIL_STATUS_MAP: Readonly<Record<string, FileStatus>> = {
	ADDED: "added",
	DELETED: "deleted",
	EDITED: "edited",
	RENAMED: "renamed",
	EXTRA: "untracked",
};

/**
 * `fossil finfo -s` labels
 */
export const FOSSIL_FILE_STATUS_MAP: Readonly<Record<string, FileStatusResult>> = {
	new: "added",
	deleted: "deleted",
	edited: "edited",
	renamed: "renamed",
	unchanged: "unchanged",
	unknown: "untracked",
};

/**
 * Look a token up in a vocabulary
 */
export function normalizeStatus<S extends string>(
	token: string,
	vocabulary: Readonly<Record<string, S>>,
): S | undefined {
	return Object.hasOwn(vocabulary, token) ? vocabulary[token] : undefined;
}

/**
 * Normalize a git short-status code.
 *
 * Single codes map directly. Two-column codes (index then worktree, e.g.
 * `MM`, `AM`, `RM`) take the first column that is in the vocabulary.
 */
export function normalizeGitStatus(token: string): FileStatus | undefined {
	const direct = normalizeStatus(token, GIT_STATUS_MAP);
	if (direct || token.length !== 2) {
		return direct;
	}
	for (const column of token) {
		const status = normalizeStatus(column, GIT_STATUS_MAP);
		if (status) {
			return status;
		}
	}
	return undefined;
}

export function normalizeFossilStatus(token: string): FileStatus | undefined {
	return normalizeStatus(token, FOSSIL_STATUS_MAP);
}
