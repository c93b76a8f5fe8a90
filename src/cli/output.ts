/**
 * @fileoverview CLI Output Formatting
 *
 * Plain-text renderings of backend records, one string per output line.
 * Colour is applied by the caller.
 *
 * @module cli/output
 */

import { relative } from "node:path";
import pc from "picocolors";
import type { LineChangeMap, LineStatus } from "../diff/line-changes.ts";
import type { BlameEntry, Commit, DiffStats, FileChange, FileStatusResult } from "../scm/index.ts";

const STATUS_LABELS: Record<FileStatusResult, string> = {
	added: "A",
	deleted: "D",
	edited: "M",
	renamed: "R",
	untracked: "?",
	unchanged: " ",
};

/**
 * Colour for a status label
 */
export function statusColor(status: FileStatusResult | LineStatus): (text: string) => string {
	switch (status) {
		case "added":
		case "addition":
			return pc.green;
		case "deleted":
		case "deletion":
			return pc.red;
		case "edited":
		case "modification":
			return pc.yellow;
		case "renamed":
			return pc.cyan;
		default:
			return pc.dim;
	}
}

/**
 * `<label><staged> <path>[ -> <newPath>]`, paths relative to `root`
 */
export function formatChange(change: FileChange, root: string): string {
	const label = STATUS_LABELS[change.status];
	const staged = change.staged ? "+" : " ";
	const path = relative(root, change.path);
	if (change.newPath) {
		return `${label}${staged} ${path} -> ${relative(root, change.newPath)}`;
	}
	return `${label}${staged} ${path}`;
}

export function formatCommit(commit: Commit): string {
	return `${commit.hash.slice(0, 10)} ${commit.date} ${commit.author}: ${commit.summary}`;
}

/**
 * Header block followed by the message body, if any
 */
export function formatCommitInfo(commit: Commit): string[] {
	const lines = [`commit ${commit.hash}`, `Author: ${commit.author}`, `Date:   ${commit.date}`, "", `    ${commit.summary}`];
	if (commit.message) {
		lines.push("", ...commit.message.split("\n").map((line) => (line ? `    ${line}` : "")));
	}
	return lines;
}

/**
 * One line per blamed source line, numbered from 1
 */
export function formatBlame(entries: BlameEntry[]): string[] {
	const width = String(entries.length).length;
	return entries.map(
		(entry, index) =>
			`${String(index + 1).padStart(width)} ${entry.commit.slice(0, 8)} ${entry.date} ${entry.author}`,
	);
}

/**
 * Changed lines in ascending order
 */
export function formatLineChanges(changes: LineChangeMap): string[] {
	return [...changes.entries()]
		.sort(([a], [b]) => a - b)
		.map(([line, status]) => `${line} ${status}`);
}

export function formatStats(stats: DiffStats): string {
	return `${stats.inserts} insertions(+), ${stats.deletes} deletions(-)`;
}
