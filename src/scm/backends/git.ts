/**
 * Git backend
 *
 * Full capability set: staging, and change-sets that aggregate every
 * submodule of the checkout.
 *
 * @module scm/backends/git
 */

import { dirname, relative, resolve, sep } from "node:path";
import pLimit from "p-limit";
import { loggers } from "../../observability/index.ts";
import { Backend, type BackendContext, copyChanges } from "../backend.ts";
import {
	GitCommitInfoParser,
	HISTORY_FORMAT,
	parseBlameLine,
	parseBranchLine,
	parseHistoryLine,
	parseNameOnlyLine,
	parseNumstatLine,
	parseStatusShortLine,
	parseSubmoduleLine,
} from "../parsers/git.ts";
import { throwIfAborted } from "../process/index.ts";
import { normalizeGitStatus } from "../status.ts";
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

export class GitBackend extends Backend {
	readonly name = "Git";
	protected readonly marker = ".git";

	constructor(context: BackendContext) {
		super(context, context.config.executables.git);
	}

	hasStaging(): boolean {
		return true;
	}

	/**
	 * Ask git for the toplevel of the checkout containing `path`, falling
	 * back to the nearest existing directory
	 */
	async repoRoot(path: string, options: OperationOptions = {}): Promise<string> {
		const directory = await this.nearestDirectory(path);
		const toplevel = await this.execute(
			(proc) => (proc.succeeded ? proc.bufferedOutput("stdout").trim() : ""),
			directory,
			["rev-parse", "--show-toplevel"],
			options,
		);
		return toplevel ? resolve(toplevel) : directory;
	}

	async getBranch(directory: string, options: OperationOptions = {}): Promise<string | null> {
		const root = await this.repoRoot(directory, options);
		return this.execute(
			async (proc) => {
				if (!this.readable(proc)) return null;
				const [branch] = await this.collect(proc, this.context.config.yield.lines, parseBranchLine);
				return branch ?? null;
			},
			root,
			["rev-parse", "--abbrev-ref", "HEAD"],
			options,
		);
	}

	/**
	 * Absolute paths of files with staged changes
	 */
	async getStaged(directory: string, options: OperationOptions = {}): Promise<Set<string>> {
		const root = await this.repoRoot(directory, options);
		const { value } = await this.context.cache.fetch("getStaged", root, () =>
			this.execute(
				async (proc) => {
					if (!this.readable(proc)) return new Set<string>();
					const paths = await this.collect(proc, this.context.config.yield.lines, parseNameOnlyLine);
					return new Set(paths.map((path) => resolve(root, path)));
				},
				root,
				["diff", "--name-only", "--cached"],
				options,
			),
		);
		return new Set(value);
	}

	/**
	 * Changes of the checkout followed by the changes of every submodule.
	 *
	 * Submodule queries run concurrently, bounded by
	 * `git.submodule_concurrency`; the aggregate is cached once all settle.
	 */
	async getChanges(directory: string, options: OperationOptions = {}): Promise<CachedResult<FileChange[]>> {
		const root = await this.repoRoot(directory, options);
		const result = await this.context.cache.fetch("getChanges", root, async () => {
			const changes = await this.collectChanges(root, options);
			const submodules = await this.listSubmodules(root, options);
			if (submodules.length === 0) {
				return changes;
			}

			const limit = pLimit(this.context.config.git.submodule_concurrency);
			const settled = await Promise.allSettled(
				submodules.map((submodule) => limit(() => this.collectChanges(submodule, options))),
			);
			throwIfAborted(options.signal, { operation: "getChanges", root });

			const seen = new Set(changes.map((change) => change.path));
			settled.forEach((outcome, index) => {
				if (outcome.status === "rejected") {
					loggers.backend.warn(
						{ submodule: submodules[index], error: outcome.reason },
						"Submodule change query failed",
					);
					return;
				}
				for (const change of outcome.value) {
					if (!seen.has(change.path)) {
						seen.add(change.path);
						changes.push(change);
					}
				}
			});
			return changes;
		});
		return copyChanges(result);
	}

	async getCommitHistory(directory: string, path?: string, options: OperationOptions = {}): Promise<Commit[]> {
		const root = await this.repoRoot(directory, options);
		const args = ["log", "--oneline", "--no-decorate", HISTORY_FORMAT];
		if (path) {
			args.push("--", this.absolute(path, directory));
		}
		return this.execute(
			async (proc) => {
				if (!this.readable(proc)) return [];
				return this.collect(proc, this.context.config.yield.history, parseHistoryLine);
			},
			root,
			args,
			options,
		);
	}

	async getCommitInfo(id: string, directory: string, options: OperationOptions = {}): Promise<Commit> {
		const root = await this.repoRoot(directory, options);
		return this.execute(
			async (proc) => {
				const parser = new GitCommitInfoParser();
				if (this.readable(proc)) {
					for await (const [, line] of proc.lineSequence("stdout", this.context.config.yield.commit_info)) {
						parser.push(line);
					}
				}
				return parser.result();
			},
			root,
			["show", "--no-patch", id],
			options,
		);
	}

	async getCommitDiff(id: string, directory: string, options: OperationOptions = {}): Promise<string> {
		const root = await this.repoRoot(directory, options);
		return this.execute((proc) => this.stdoutOf(proc), root, ["show", "-U", id], options);
	}

	/**
	 * File content at a revision (HEAD by default)
	 */
	async getCommitFile(
		directory: string,
		file: string,
		id = "HEAD",
		options: OperationOptions = {},
	): Promise<string> {
		const path = this.absolute(file, directory);
		const root = await this.repoRoot(dirname(path), options);
		const revision = `${id}:${relative(root, path).split(sep).join("/")}`;
		return this.execute((proc) => this.stdoutOf(proc), root, ["show", revision], options);
	}

	async getDiff(directory: string, options: OperationOptions = {}): Promise<string> {
		const root = await this.repoRoot(directory, options);
		return this.execute((proc) => this.stdoutOf(proc), root, ["diff"], options);
	}

	async getFileDiff(file: string, directory: string, options: OperationOptions = {}): Promise<string> {
		const path = this.absolute(file, directory);
		const root = await this.repoRoot(dirname(path), options);
		const { value } = await this.context.cache.fetch(
			"getFileDiff",
			path,
			() => this.execute((proc) => this.stdoutOf(proc), root, ["diff", path], options),
			this.context.config.cache.file_diff_expiry,
		);
		return value;
	}

	async getFileStatus(file: string, directory: string, options: OperationOptions = {}): Promise<FileStatusResult> {
		const path = this.absolute(file, directory);
		const root = await this.repoRoot(dirname(path), options);
		const { value } = await this.context.cache.fetch(
			"getFileStatus",
			path,
			() =>
				this.execute(
					async (proc): Promise<FileStatusResult> => {
						if (!this.readable(proc)) return "unchanged";
						const lines = await this.collect(proc, this.context.config.yield.lines, parseStatusShortLine);
						for (const line of lines) {
							const status = normalizeGitStatus(line.code);
							if (status) return status;
						}
						return "unchanged";
					},
					root,
					["status", "-s", path],
					options,
				),
			this.context.config.cache.file_status_expiry,
		);
		return value;
	}

	async getFileBlame(file: string, directory: string, options: OperationOptions = {}): Promise<BlameEntry[] | null> {
		const path = this.absolute(file, directory);
		const root = await this.repoRoot(dirname(path), options);
		const { value } = await this.context.cache.fetch(
			"getFileBlame",
			path,
			() =>
				this.execute(
					async (proc) => {
						if (!this.readable(proc)) return null;
						return this.collect(proc, this.context.config.yield.blame, parseBlameLine);
					},
					root,
					["blame", path],
					options,
				),
			this.context.config.cache.blame_expiry,
		);
		return value;
	}

	async getStats(directory: string, options: OperationOptions = {}): Promise<DiffStats> {
		const root = await this.repoRoot(directory, options);
		return this.execute(
			async (proc) => {
				const stats: DiffStats = { inserts: 0, deletes: 0 };
				if (!this.readable(proc)) return stats;
				const rows = await this.collect(proc, this.context.config.yield.lines, parseNumstatLine);
				for (const row of rows) {
					stats.inserts += row.inserts;
					stats.deletes += row.deletes;
				}
				return stats;
			},
			root,
			["diff", "--numstat"],
			options,
		);
	}

	async getStatus(directory: string, options: OperationOptions = {}): Promise<string> {
		const root = await this.repoRoot(directory, options);
		return this.execute((proc) => this.stdoutOf(proc), root, ["status"], options);
	}

	async pull(directory: string, options: OperationOptions = {}): Promise<ExecStatus> {
		const root = await this.repoRoot(directory, options);
		return this.mutate("pull", root, ["pull"], [], options);
	}

	async revertFile(file: string, directory: string, options: OperationOptions = {}): Promise<ExecStatus> {
		const path = this.absolute(file, directory);
		const root = await this.repoRoot(dirname(path), options);
		return this.mutate("revert", root, ["restore", path], [path], options);
	}

	async addPath(path: string, directory: string, options: OperationOptions = {}): Promise<ExecStatus> {
		const target = this.absolute(path, directory);
		const root = await this.repoRoot(dirname(target), options);
		return this.mutate("add", root, ["add", target], [target], options);
	}

	async removePath(path: string, directory: string, options: OperationOptions = {}): Promise<ExecStatus> {
		const target = this.absolute(path, directory);
		const root = await this.repoRoot(dirname(target), options);
		return this.mutate("remove", root, ["rm", "-r", "--cached", target], [target], options);
	}

	async movePath(from: string, to: string, directory: string, options: OperationOptions = {}): Promise<ExecStatus> {
		const source = this.absolute(from, directory);
		const target = this.absolute(to, directory);
		const root = await this.repoRoot(dirname(source), options);
		return this.mutate("move", root, ["mv", source, target], [source, target], options);
	}

	async stageFile(file: string, directory: string, options: OperationOptions = {}): Promise<ExecStatus> {
		const path = this.absolute(file, directory);
		const root = await this.repoRoot(dirname(path), options);
		return this.mutate("stage", root, ["add", path], [path], options);
	}

	async unstageFile(file: string, directory: string, options: OperationOptions = {}): Promise<ExecStatus> {
		const path = this.absolute(file, directory);
		const root = await this.repoRoot(dirname(path), options);
		return this.mutate("unstage", root, ["restore", "--staged", path], [path], options);
	}

	/**
	 * `status --short` of one checkout, without submodules
	 */
	private async collectChanges(root: string, options: OperationOptions): Promise<FileChange[]> {
		const staged = await this.getStaged(root, options);
		return this.execute(
			async (proc) => {
				if (!this.readable(proc)) return [];
				const lines = await this.collect(proc, this.context.config.yield.lines, parseStatusShortLine);
				const changes: FileChange[] = [];
				for (const line of lines) {
					const status = normalizeGitStatus(line.code);
					if (!status) continue;

					const path = resolve(root, line.path);
					const change: FileChange = { status, path, staged: staged.has(path) };
					if (status === "renamed") {
						change.newPath = resolve(root, line.newPath ?? line.path);
						change.staged = staged.has(change.newPath);
					}
					changes.push(change);
				}
				return changes;
			},
			root,
			["status", "--short"],
			options,
		);
	}

	/**
	 * Absolute paths of submodules that exist on disk
	 */
	private async listSubmodules(root: string, options: OperationOptions): Promise<string[]> {
		const paths = await this.execute(
			async (proc) => {
				if (!this.readable(proc)) return [];
				return this.collect(proc, this.context.config.yield.lines, parseSubmoduleLine);
			},
			root,
			["submodule", "foreach", "--recursive"],
			options,
		);

		const submodules: string[] = [];
		for (const path of paths) {
			const absolute = resolve(root, path);
			const info = await this.context.probe.getInfo(absolute);
			if (info?.type === "dir") {
				submodules.push(absolute);
			}
		}
		return submodules;
	}

	private async nearestDirectory(path: string): Promise<string> {
		let current = path;
		for (;;) {
			const info = await this.context.probe.getInfo(current);
			if (info?.type === "dir") return current;
			const parent = dirname(current);
			if (parent === current) return path;
			current = parent;
		}
	}
}
