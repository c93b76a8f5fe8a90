/**
 * Git output grammar
 *
 * Per-line matchers for the git commands the backend issues. Every matcher
 * returns null for a line outside its grammar so callers can skip it.
 *
 * @module scm/parsers/git
 */

import type { BlameEntry, Commit } from "../types.ts";

/**
 * Parsed `git status --short` line
 */
export interface GitStatusLine {
	/** Raw status code, trimmed (`M`, `??`, `RM`, ...) */
	code: string;
	/** Path relative to the repository root (the original path for renames) */
	path: string;
	/** Destination path for renames */
	newPath?: string;
}

/**
 * Strip the quoting git applies to paths with unusual characters
 */
export function unquotePath(path: string): string {
	if (path.length >= 2 && path.startsWith('"') && path.endsWith('"')) {
		return path.slice(1, -1).replace(/\\(["\\])/g, "$1");
	}
	return path;
}

/**
 * Parse one `git status --short` line
 *
 * Format: XY PATH
 * For renames: XY ORIG_PATH -> NEW_PATH
 */
export function parseStatusShortLine(line: string): GitStatusLine | null {
	if (line.length < 4) return null;

	const code = line.slice(0, 2).trim();
	const pathPart = line.slice(3);
	if (!code || !pathPart.trim()) return null;

	// Check for rename (contains " -> ")
	const renameMatch = pathPart.match(/^(.+) -> (.+)$/);
	if (renameMatch) {
		return {
			code,
			path: unquotePath(renameMatch[1]),
			newPath: unquotePath(renameMatch[2]),
		};
	}

	return { code, path: unquotePath(pathPart) };
}

/**
 * Parse `git rev-parse --abbrev-ref HEAD` output line
 */
export function parseBranchLine(line: string): string | null {
	return line.match(/^\S+/)?.[0] ?? null;
}

/**
 * Parse a `git diff --name-only` line into a trimmed path
 */
export function parseNameOnlyLine(line: string): string | null {
	const trimmed = line.trim();
	return trimmed ? unquotePath(trimmed) : null;
}

/**
 * Parse a `git submodule foreach` line
 *
 * Format: Entering 'path/to/submodule'
 */
export function parseSubmoduleLine(line: string): string | null {
	const rest = line.match(/^\S+\s+(.+)$/)?.[1];
	if (!rest) return null;
	const quoted = rest.match(/^'(.+)'$/);
	return quoted ? quoted[1] : null;
}

/**
 * Pretty format used for history queries: quoted author, hash, unix time, subject
 */
export const HISTORY_FORMAT = "--pretty=format:'%an' %H %ct %s";

/**
 * Format a unix timestamp (seconds) as `YYYY-MM-DD hh:mm AM` in local time
 */
export function formatTimestamp(seconds: number): string {
	const date = new Date(seconds * 1000);
	const pad = (value: number) => String(value).padStart(2, "0");
	const hours = date.getHours();
	const hour12 = hours % 12 === 0 ? 12 : hours % 12;
	const meridiem = hours < 12 ? "AM" : "PM";
	return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(hour12)}:${pad(date.getMinutes())} ${meridiem}`;
}

/**
 * Parse one history line produced with HISTORY_FORMAT
 */
export function parseHistoryLine(line: string): Commit | null {
	const match = line.match(/^'(.*?)' (\S+) (\S+) (.*)$/);
	if (!match) return null;

	const [, author, hash, timestamp, summary] = match;
	const seconds = Number(timestamp);
	return {
		author,
		hash,
		date: Number.isFinite(seconds) ? formatTimestamp(seconds) : timestamp,
		summary,
	};
}

/**
 * Incremental parser for `git show --no-patch` output
 *
 * ```
 * commit <hash>
 * Author: <name> <email>
 * Date:   <date>
 *
 *     <summary>
 *
 *     <message...>
 * ```
 *
 * Header fields are matched in order; a line that does not match the field
 * currently expected (a `Merge:` line, say) is skipped.
 */
export class GitCommitInfoParser {
	private hash?: string;
	private author?: string;
	private date?: string;
	private summary?: string;
	private messageLines?: string[];

	push(line: string): void {
		if (this.hash === undefined) {
			this.hash = line.match(/^commit\s+([a-zA-Z0-9]+)/)?.[1];
		} else if (this.author === undefined) {
			this.author = line.match(/^Author:\s+(.+)$/)?.[1];
		} else if (this.date === undefined) {
			this.date = line.match(/^Date:\s+(.+)$/)?.[1];
		} else if (this.summary === undefined) {
			this.summary = line.match(/^ {4}(.+)$/)?.[1];
		} else if (this.messageLines) {
			this.messageLines.push(line.match(/^ {4}(.*)$/)?.[1] ?? "");
		} else if (line !== "") {
			const body = line.match(/^ {4}(.+)$/)?.[1];
			if (body !== undefined) {
				this.messageLines = [body];
			}
		}
	}

	result(): Commit {
		const message = this.messageLines?.join("\n").trimEnd();
		return {
			hash: this.hash ?? "",
			author: this.author ?? "",
			date: this.date ?? "",
			summary: this.summary ?? "",
			...(message ? { message } : {}),
		};
	}
}

/**
 * Parse one `git blame` line
 *
 * Format: [^]<hash> [<path>] (<author> <yyyy-mm-dd> <time> <tz> <line>) <content>
 */
export function parseBlameLine(line: string): BlameEntry | null {
	const match = line.match(/^\^?([A-Fa-f0-9]+) (?:[^(]*? )?\((.*?) (\d{4}-\d{2}-\d{2})/);
	if (!match) return null;
	return {
		commit: match[1],
		author: match[2].trim(),
		date: match[3],
	};
}

/**
 * Parse one `git diff --numstat` line into insert/delete counts
 *
 * Binary files (`-\t-\tpath`) yield null.
 */
export function parseNumstatLine(line: string): { inserts: number; deletes: number } | null {
	const match = line.match(/^\s*(\d+)\s+(\d+)/);
	if (!match) return null;
	return { inserts: Number(match[1]), deletes: Number(match[2]) };
}
