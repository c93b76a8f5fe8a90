/**
 * Unified-diff line classifier
 *
 * Turns diff text into a map from destination-file line number to the kind
 * of change on that line. Context lines are absent from the map. Input that
 * does not follow the unified format is skipped, never thrown on.
 *
 * @module diff/line-changes
 */

/**
 * Change kind of a destination-file line
 */
export type LineStatus = "addition" | "deletion" | "modification";

/**
 * Destination line number to status
 */
export type LineChangeMap = Map<number, LineStatus>;

/**
 * Run of consecutive `+` or `-` lines, positioned in the destination file
 */
interface LineRange {
	start: number;
	length: number;
}

interface HunkState {
	/** Next destination line number */
	newLine: number;
	oldRemaining: number;
	newRemaining: number;
	deletion?: LineRange;
	addition?: LineRange;
}

const HUNK_HEADER = /^@@ -(\d+)(?:,(\d+))? \+(\d+)(?:,(\d+))? @@/;

/**
 * Parse a hunk header; an omitted count means 1
 */
function parseHunkHeader(line: string): HunkState | null {
	const match = line.match(HUNK_HEADER);
	if (!match) return null;

	const oldCount = match[2] === undefined ? 1 : Number(match[2]);
	const newStart = Number(match[3]);
	const newCount = match[4] === undefined ? 1 : Number(match[4]);

	return {
		// With no destination lines the header names the line before the removal
		newLine: newCount === 0 ? newStart + 1 : newStart,
		oldRemaining: oldCount,
		newRemaining: newCount,
	};
}

/**
 * Classify every changed destination line of a unified diff
 */
export function parseLineChanges(diff: string): LineChangeMap {
	const deletions: LineRange[] = [];
	const additions: LineRange[] = [];
	let hunk: HunkState | null = null;

	const flushDeletion = (state: HunkState) => {
		if (state.deletion) {
			deletions.push(state.deletion);
			state.deletion = undefined;
		}
	};
	const flushAddition = (state: HunkState) => {
		if (state.addition) {
			additions.push(state.addition);
			state.addition = undefined;
		}
	};
	const closeHunk = () => {
		if (hunk) {
			flushDeletion(hunk);
			flushAddition(hunk);
			hunk = null;
		}
	};

	for (const rawLine of diff.split("\n")) {
		const line = rawLine.endsWith("\r") ? rawLine.slice(0, -1) : rawLine;

		if (line.startsWith("@@")) {
			closeHunk();
			hunk = parseHunkHeader(line);
			continue;
		}
		if (!hunk) continue;

		const marker = line[0];
		if (marker === "-" && hunk.oldRemaining > 0) {
			if (hunk.deletion) {
				hunk.deletion.length++;
			} else {
				hunk.deletion = { start: hunk.newLine, length: 1 };
			}
			hunk.oldRemaining--;
			if (hunk.oldRemaining === 0) flushDeletion(hunk);
		} else if (marker === "+" && hunk.newRemaining > 0) {
			if (hunk.addition) {
				hunk.addition.length++;
			} else {
				hunk.addition = { start: hunk.newLine, length: 1 };
			}
			hunk.newLine++;
			hunk.newRemaining--;
			if (hunk.newRemaining === 0) flushAddition(hunk);
		} else if ((marker === " " || line === "") && hunk.oldRemaining > 0 && hunk.newRemaining > 0) {
			flushDeletion(hunk);
			flushAddition(hunk);
			hunk.newLine++;
			hunk.oldRemaining--;
			hunk.newRemaining--;
		} else if (marker !== "\\") {
			// Outside the declared counts: the hunk is over
			closeHunk();
			continue;
		}

		if (hunk.oldRemaining === 0 && hunk.newRemaining === 0) {
			closeHunk();
		}
	}
	closeHunk();

	return reconcile(deletions, additions);
}

/**
 * Merge deletion and addition ranges into per-line statuses.
 *
 * A deletion anchored where an addition starts is an edit: the overlapping
 * lines become modifications and, if more lines were removed than added,
 * one deletion marker follows them. A lone deletion marks its anchor line.
 * Addition lines not already assigned are additions.
 */
function reconcile(deletions: LineRange[], additions: LineRange[]): LineChangeMap {
	const changes: LineChangeMap = new Map();
	const additionsByStart = new Map<number, LineRange>();
	for (const range of additions) {
		additionsByStart.set(range.start, range);
	}

	for (const deletion of deletions) {
		const partner = additionsByStart.get(deletion.start);
		const paired = partner ? Math.min(partner.length, deletion.length) : 0;

		for (let offset = 0; offset < paired; offset++) {
			changes.set(deletion.start + offset, "modification");
		}
		if (paired < deletion.length) {
			const anchor = deletion.start + paired;
			if (!changes.has(anchor)) {
				changes.set(anchor, "deletion");
			}
		}
	}

	for (const addition of additions) {
		for (let offset = 0; offset < addition.length; offset++) {
			const line = addition.start + offset;
			if (!changes.has(line)) {
				changes.set(line, "addition");
			}
		}
	}

	return changes;
}
