/**
 * Fossil output grammar
 *
 * @module scm/parsers/fossil
 */

import type { BlameEntry, Commit } from "../types.ts";

/**
 * Parsed `fossil changes --differ` line
 */
export interface FossilChangeLine {
	/** Raw label (`EDITED`, `EXTRA`, ...) */
	label: string;
	path: string;
	newPath?: string;
}

/**
 * Parse `fossil branch` output line; only the current branch (`* name`) matches
 */
export function parseBranchLine(line: string): string | null {
	return line.match(/^\s*\*\s*(\S+)/)?.[1] ?? null;
}

/**
 * Parse one `fossil changes --differ` line
 *
 * Format: LABEL   PATH
 * For renames: RENAMED   OLD -> NEW, or RENAMED   PATH when fossil only
 * reports the current name
 */
export function parseChangeLine(line: string): FossilChangeLine | null {
	const match = line.match(/^\s*(\S+)\s+(.+?)\s*$/);
	if (!match) return null;

	const [, label, rest] = match;
	const renameMatch = rest.match(/^(.+?)\s+->\s+(.+)$/);
	if (renameMatch) {
		return { label, path: renameMatch[1], newPath: renameMatch[2] };
	}
	return { label, path: rest };
}

/**
 * Timeline format: quoted user, hash, quoted date, comment
 */
export const TIMELINE_FORMAT = "'%a' %H '%d' %c";

/**
 * Parse one `fossil timeline -F TIMELINE_FORMAT` line
 */
export function parseTimelineLine(line: string): Commit | null {
	const match = line.match(/'(.*?)' (\S+) '(.*?)' (.*)$/);
	if (!match) return null;
	const [, author, hash, date, summary] = match;
	return { author, hash, date, summary };
}

/**
 * Incremental parser for `fossil info <id>` output
 *
 * ```
 * hash:         <hash> <date>
 * ...
 * comment:      <summary> (user: <author>)
 * <message...>
 * ```
 */
export class FossilCommitInfoParser {
	private hash?: string;
	private date?: string;
	private summary?: string;
	private author?: string;
	private messageLines?: string[];

	push(line: string): void {
		if (this.hash === undefined) {
			const match = line.match(/^hash:\s+([a-zA-Z0-9]+)\s+(.*)$/);
			if (match) {
				this.hash = match[1];
				this.date = match[2];
			}
		} else if (this.summary === undefined) {
			const match = line.match(/^comment:\s+(.*?)\s+\(user: (.*?)\)$/);
			if (match) {
				this.summary = match[1];
				this.author = match[2];
			}
		} else if (this.messageLines) {
			this.messageLines.push(line);
		} else if (line !== "") {
			this.messageLines = [line];
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
 * Parse one `fossil blame` line
 *
 * Format: <hash> <yyyy-mm-dd>   <user>: <content>
 */
export function parseBlameLine(line: string): BlameEntry | null {
	const match = line.match(/^([A-Fa-f0-9]+) (\d{4}-\d{2}-\d{2})\s+(.*?):/);
	if (!match) return null;
	return { commit: match[1], date: match[2], author: match[3] };
}

/**
 * Parse the totals from a `fossil diff --numstat` line
 */
export function parseNumstatLine(line: string): { inserts: number; deletes: number } | null {
	const match = line.match(/^\s*(\d+)\s+(\d+)/);
	if (!match) return null;
	return { inserts: Number(match[1]), deletes: Number(match[2]) };
}

/**
 * Leading label of a `fossil finfo -s` line
 */
export function parseFileInfoLine(line: string): string | null {
	return line.match(/^\S+/)?.[0] ?? null;
}
