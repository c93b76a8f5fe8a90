/**
 * Fossil backend
 *
 * Reduced capability set: no staging area and no nested checkouts. The
 * repository root is always the project directory.
 *
 * @module scm/backends/fossil
 */

import { Backend, type BackendContext, copyChanges } from "../backend.ts";
import {
	FossilCommitInfoParser,
	TIMELINE_FORMAT,
	parseBlameLine,
	parseBranchLine,
	parseChangeLine,
	parseFileInfoLine,
	parseNumstatLine,
	parseTimelineLine,
} from "../parsers/fossil.ts";
import { FOSSIL_FILE_STATUS_MAP, normalizeFossilStatus, normalizeStatus } from "../status.ts";
import type {
	BlameEntry,
	CachedResult,
	Commit,
	DiffStats,
	ExecStatus,
	FileChange,
	FileStatusResult,
	OperationOptions,
} from "../types.ts";

export class FossilBackend extends Backend {
	readonly name = "Fossil";
	protected readonly marker = ".fslckout";

	constructor(context: BackendContext) {
		super(context, context.config.executables.fossil);
	}

	async getBranch(directory: string, options: OperationOptions = {}): Promise<string | null> {
		return this.execute(
			async (proc) => {
				if (!this.readable(proc)) return null;
				const [branch] = await this.collect(proc, this.context.config.yield.lines, parseBranchLine);
				return branch ?? null;
			},
			directory,
			["branch"],
			options,
		);
	}

	async getStaged(_directory: string, _options?: OperationOptions): Promise<Set<string>> {
		return new Set();
	}

	async getChanges(directory: string, options: OperationOptions = {}): Promise<CachedResult<FileChange[]>> {
		const result = await this.context.cache.fetch("getChanges", directory, () =>
			this.execute(
				async (proc) => {
					if (!this.readable(proc)) return [];
					const lines = await this.collect(proc, this.context.config.yield.lines, parseChangeLine);
					const changes: FileChange[] = [];
					const seen = new Set<string>();
					for (const line of lines) {
						const status = normalizeFossilStatus(line.label);
						if (!status) continue;

						const path = this.absolute(line.path, directory);
						if (seen.has(path)) continue;
						seen.add(path);

						const change: FileChange = { status, path };
						if (status === "renamed") {
							// Without an arrow fossil only names the current path
							change.newPath = this.absolute(line.newPath ?? line.path, directory);
						}
						changes.push(change);
					}
					return changes;
				},
				directory,
				["changes", "--differ"],
				options,
			),
		);
		return copyChanges(result);
	}

	async getCommitHistory(directory: string, path?: string, options: OperationOptions = {}): Promise<Commit[]> {
		const args = ["timeline", "-n", "0", "-F", TIMELINE_FORMAT];
		if (path) {
			args.push("-p", this.absolute(path, directory));
		}
		return this.execute(
			async (proc) => {
				if (!this.readable(proc)) return [];
				return this.collect(proc, this.context.config.yield.history, parseTimelineLine);
			},
			directory,
			args,
			options,
		);
	}

	async getCommitInfo(id: string, directory: string, options: OperationOptions = {}): Promise<Commit> {
		return this.execute(
			async (proc) => {
				const parser = new FossilCommitInfoParser();
				if (this.readable(proc)) {
					for await (const [, line] of proc.lineSequence("stdout", this.context.config.yield.commit_info)) {
						parser.push(line);
					}
				}
				return parser.result();
			},
			directory,
			["info", id],
			options,
		);
	}

	async getCommitDiff(id: string, directory: string, options: OperationOptions = {}): Promise<string> {
		return this.execute((proc) => this.stdoutOf(proc), directory, ["diff", "--unified", "-ci", id], options);
	}

	/**
	 * File content at a revision (the checkout version by default)
	 */
	async getCommitFile(
		directory: string,
		file: string,
		id?: string,
		options: OperationOptions = {},
	): Promise<string> {
		const args = ["cat", this.absolute(file, directory)];
		if (id) {
			args.push("-r", id);
		}
		return this.execute((proc) => this.stdoutOf(proc), directory, args, options);
	}

	async getDiff(directory: string, options: OperationOptions = {}): Promise<string> {
		return this.execute((proc) => this.stdoutOf(proc), directory, ["diff"], options);
	}

	async getFileDiff(file: string, directory: string, options: OperationOptions = {}): Promise<string> {
		const path = this.absolute(file, directory);
		const { value } = await this.context.cache.fetch(
			"getFileDiff",
			path,
			() => this.execute((proc) => this.stdoutOf(proc), directory, ["diff", path], options),
			this.context.config.cache.file_diff_expiry,
		);
		return value;
	}

	async getFileStatus(file: string, directory: string, options: OperationOptions = {}): Promise<FileStatusResult> {
		const path = this.absolute(file, directory);
		const { value } = await this.context.cache.fetch(
			"getFileStatus",
			path,
			() =>
				this.execute(
					async (proc): Promise<FileStatusResult> => {
						if (!this.readable(proc)) return "unchanged";
						const tokens = await this.collect(proc, this.context.config.yield.lines, parseFileInfoLine);
						for (const token of tokens) {
							const status = normalizeStatus(token, FOSSIL_FILE_STATUS_MAP);
							if (status) return status;
						}
						return "unchanged";
					},
					directory,
					["finfo", "-s", path],
					options,
				),
			this.context.config.cache.file_status_expiry,
		);
		return value;
	}

	async getFileBlame(file: string, directory: string, options: OperationOptions = {}): Promise<BlameEntry[] | null> {
		const path = this.absolute(file, directory);
		const { value } = await this.context.cache.fetch(
			"getFileBlame",
			path,
			() =>
				this.execute(
					async (proc) => {
						if (!this.readable(proc)) return null;
						return this.collect(proc, this.context.config.yield.blame, parseBlameLine);
					},
					directory,
					["blame", path],
					options,
				),
			this.context.config.cache.blame_expiry,
		);
		return value;
	}

	/**
	 * Totals from the summary row `fossil diff --numstat` prints last
	 */
	async getStats(directory: string, options: OperationOptions = {}): Promise<DiffStats> {
		return this.execute(
			async (proc) => {
				let last: string | undefined;
				if (this.readable(proc)) {
					for await (const [, line] of proc.lineSequence("stdout", this.context.config.yield.lines)) {
						if (line.trim()) last = line;
					}
				}
				const totals = last ? parseNumstatLine(last) : null;
				return totals ?? { inserts: 0, deletes: 0 };
			},
			directory,
			["diff", "--numstat"],
			options,
		);
	}

	async getStatus(directory: string, options: OperationOptions = {}): Promise<string> {
		return this.execute((proc) => this.stdoutOf(proc), directory, ["status"], options);
	}

	async pull(directory: string, options: OperationOptions = {}): Promise<ExecStatus> {
		return this.mutate("pull", directory, ["pull"], [], options);
	}

	async revertFile(file: string, directory: string, options: OperationOptions = {}): Promise<ExecStatus> {
		const path = this.absolute(file, directory);
		return this.mutate("revert", directory, ["revert", path], [path], options);
	}

	async addPath(path: string, directory: string, options: OperationOptions = {}): Promise<ExecStatus> {
		const target = this.absolute(path, directory);
		return this.mutate("add", directory, ["add", target], [target], options);
	}

	async removePath(path: string, directory: string, options: OperationOptions = {}): Promise<ExecStatus> {
		const target = this.absolute(path, directory);
		return this.mutate("remove", directory, ["rm", target], [target], options);
	}

	async movePath(from: string, to: string, directory: string, options: OperationOptions = {}): Promise<ExecStatus> {
		const source = this.absolute(from, directory);
		const target = this.absolute(to, directory);
		return this.mutate("move", directory, ["mv", source, target], [source, target], options);
	}
}
