/**
 * Backend Capability Interface
 *
 * Declares the operation set every version-control backend implements and
 * provides the shared orchestration: subprocess execution through the
 * injected runner, cooperative output consumption, cache access, detection,
 * mutation bookkeeping and change-notification subscriptions.
 *
 * @module scm/backend
 */

import { join, resolve } from "node:path";
import type { ScmConfig } from "../config/index.ts";
import { bus } from "../events/index.ts";
import { loggers } from "../observability/index.ts";
import type { ExecutableResolver, PathProbe } from "../platform/index.ts";
import type { FileWatcher, Unsubscribe } from "../watch/index.ts";
import type { ResultCache } from "./cache/index.ts";
import { type CommandRunner, ProcessHandle, throwIfAborted } from "./process/index.ts";
import type {
	BlameEntry,
	CachedResult,
	Commit,
	DiffStats,
	ExecStatus,
	FileChange,
	FileStatusResult,
	OperationOptions,
} from "./types.ts";

/**
 * Value type cached per backend operation
 */
export type ScmCacheMap = {
	getStaged: Set<string>;
	getChanges: FileChange[];
	getFileDiff: string;
	getFileStatus: FileStatusResult;
	getFileBlame: BlameEntry[] | null;
};

/**
 * Collaborators a backend runs against, owned by the repository session
 */
export interface BackendContext {
	config: ScmConfig;
	cache: ResultCache<ScmCacheMap>;
	runner: CommandRunner;
	probe: PathProbe;
	resolver: ExecutableResolver;
	watcher?: FileWatcher;
}

/**
 * Canonical operation set
 *
 * `file` and `path` arguments may be absolute or relative to `directory`.
 */
export interface ScmBackend {
	/** Display name */
	readonly name: string;
	/** Executable name or path */
	readonly command: string;

	detect(directory: string): Promise<boolean>;
	hasStaging(): boolean;
	repoRoot(path: string, options?: OperationOptions): Promise<string>;
	controlPath(directory: string): string;

	getBranch(directory: string, options?: OperationOptions): Promise<string | null>;
	getStaged(directory: string, options?: OperationOptions): Promise<Set<string>>;
	getChanges(directory: string, options?: OperationOptions): Promise<CachedResult<FileChange[]>>;
	getCommitHistory(directory: string, path?: string, options?: OperationOptions): Promise<Commit[]>;
	getCommitInfo(id: string, directory: string, options?: OperationOptions): Promise<Commit>;
	getCommitDiff(id: string, directory: string, options?: OperationOptions): Promise<string>;
	getCommitFile(directory: string, file: string, id?: string, options?: OperationOptions): Promise<string>;
	getDiff(directory: string, options?: OperationOptions): Promise<string>;
	getFileDiff(file: string, directory: string, options?: OperationOptions): Promise<string>;
	getFileStatus(file: string, directory: string, options?: OperationOptions): Promise<FileStatusResult>;
	getFileBlame(file: string, directory: string, options?: OperationOptions): Promise<BlameEntry[] | null>;
	getStats(directory: string, options?: OperationOptions): Promise<DiffStats>;
	getStatus(directory: string, options?: OperationOptions): Promise<string>;

	pull(directory: string, options?: OperationOptions): Promise<ExecStatus>;
	revertFile(file: string, directory: string, options?: OperationOptions): Promise<ExecStatus>;
	addPath(path: string, directory: string, options?: OperationOptions): Promise<ExecStatus>;
	removePath(path: string, directory: string, options?: OperationOptions): Promise<ExecStatus>;
	movePath(from: string, to: string, directory: string, options?: OperationOptions): Promise<ExecStatus>;
	stageFile(file: string, directory: string, options?: OperationOptions): Promise<ExecStatus>;
	unstageFile(file: string, directory: string, options?: OperationOptions): Promise<ExecStatus>;

	watchProject(directory: string): void;
	unwatchProject(directory: string): Promise<void>;
}

/**
 * Turn a finished mutating command into a success flag and message
 */
export function execStatus(proc: ProcessHandle): ExecStatus {
	if (proc.succeeded) {
		return { success: true, message: "" };
	}
	const stderr = proc.bufferedOutput("stderr");
	const message = stderr || proc.bufferedOutput("stdout");
	return { success: false, message };
}

/**
 * Copy of a cached change list that callers may modify
 */
export function copyChanges(result: CachedResult<FileChange[]>): CachedResult<FileChange[]> {
	return { ...result, value: result.value.map((change) => ({ ...change })) };
}

/**
 * Shared orchestration for backend variants
 */
export abstract class Backend implements ScmBackend {
	abstract readonly name: string;
	readonly command: string;

	/** Entry whose presence in a directory marks a checkout */
	protected abstract readonly marker: string;
	protected readonly context: BackendContext;
	private readonly watches = new Map<string, Unsubscribe>();

	constructor(context: BackendContext, command: string) {
		this.context = context;
		this.command = command;
	}

	/**
	 * Run the executable with `args` in `cwd` and hand the finished process
	 * to `handler`
	 */
	async execute<T>(
		handler: (proc: ProcessHandle) => T | Promise<T>,
		cwd: string,
		args: string[],
		options: OperationOptions = {},
	): Promise<T> {
		throwIfAborted(options.signal, { command: this.command, args });

		const { process: processConfig } = this.context.config;
		const result = await this.context.runner(this.command, args, {
			cwd,
			timeout: processConfig.timeout_ms,
			killGraceMs: processConfig.kill_grace_ms,
			env: processConfig.env,
			signal: options.signal,
		});
		const proc = ProcessHandle.fromResult(this.command, args, result, options.signal);

		if (!proc.succeeded) {
			loggers.backend.debug(
				{ command: this.command, args, cwd, exitCode: proc.exitCode },
				"Command exited with nonzero status",
			);
		}
		return handler(proc);
	}

	/**
	 * Claim `directory` when the marker is present and the executable resolves
	 */
	async detect(directory: string): Promise<boolean> {
		const entries = await this.context.probe.list(directory);
		if (!entries?.includes(this.marker)) {
			return false;
		}
		if (this.context.resolver(this.command) === null) {
			loggers.backend.warn({ backend: this.name, command: this.command }, "Executable not found");
			return false;
		}
		return true;
	}

	hasStaging(): boolean {
		return false;
	}

	/**
	 * Repository root for `path`; the path itself unless a variant knows better
	 */
	async repoRoot(path: string, _options: OperationOptions = {}): Promise<string> {
		return path;
	}

	controlPath(directory: string): string {
		return join(directory, this.marker);
	}

	/**
	 * Subscribe to changes of the control-metadata path; a notification
	 * clears every cache entry scoped to `directory`
	 */
	watchProject(directory: string): void {
		const { watcher, cache } = this.context;
		if (!watcher || this.watches.has(directory)) {
			return;
		}
		const unsubscribe = watcher.watch(this.controlPath(directory), (changedPath) => {
			cache.invalidatePath(directory, "watch");
			bus.emit("scm:watch:change", { root: directory, path: changedPath });
		});
		this.watches.set(directory, unsubscribe);
	}

	async unwatchProject(directory: string): Promise<void> {
		const unsubscribe = this.watches.get(directory);
		if (unsubscribe) {
			this.watches.delete(directory);
			await unsubscribe();
		}
	}

	async stageFile(_file: string, _directory: string, _options?: OperationOptions): Promise<ExecStatus> {
		return { success: false, message: `${this.name} does not support staging` };
	}

	async unstageFile(_file: string, _directory: string, _options?: OperationOptions): Promise<ExecStatus> {
		return { success: false, message: `${this.name} does not support staging` };
	}

	/**
	 * Run a mutating command, then invalidate the repository and the touched
	 * paths whatever the outcome
	 */
	protected async mutate(
		operation: string,
		root: string,
		args: string[],
		paths: string[],
		options: OperationOptions = {},
	): Promise<ExecStatus> {
		const status = await this.execute(execStatus, root, args, options);
		const { cache } = this.context;

		cache.invalidatePath(root, operation);
		for (const path of paths) {
			cache.invalidatePath(path, operation);
		}
		bus.emit("scm:path:mutated", { operation, paths, success: status.success });

		if (!status.success) {
			loggers.backend.info({ backend: this.name, operation, message: status.message }, "Mutation failed");
		}
		return status;
	}

	/**
	 * Parse stdout line by line, yielding every `yieldEvery` lines; lines
	 * the parser rejects are skipped
	 */
	protected async collect<T>(
		proc: ProcessHandle,
		yieldEvery: number,
		parse: (line: string) => T | null,
	): Promise<T[]> {
		const items: T[] = [];
		for await (const [, line] of proc.lineSequence("stdout", yieldEvery)) {
			const item = parse(line);
			if (item === null) {
				loggers.backend.trace({ command: this.command, line }, "Skipping unmatched line");
			} else {
				items.push(item);
			}
		}
		return items;
	}

	/**
	 * Whether a read command succeeded; failures are logged and the caller
	 * degrades to an empty result
	 */
	protected readable(proc: ProcessHandle): boolean {
		if (proc.succeeded) {
			return true;
		}
		loggers.backend.warn(
			{
				backend: this.name,
				args: proc.args,
				exitCode: proc.exitCode,
				timedOut: proc.timedOut,
				stderr: proc.bufferedOutput("stderr").trim(),
			},
			"Read command failed",
		);
		return false;
	}

	/**
	 * Whole stdout of a read command, empty when it failed
	 */
	protected stdoutOf(proc: ProcessHandle): string {
		return this.readable(proc) ? proc.bufferedOutput("stdout") : "";
	}

	/**
	 * Absolute form of a path given relative to `directory`
	 */
	protected absolute(path: string, directory: string): string {
		return resolve(directory, path);
	}

	abstract getBranch(directory: string, options?: OperationOptions): Promise<string | null>;
	abstract getStaged(directory: string, options?: OperationOptions): Promise<Set<string>>;
	abstract getChanges(directory: string, options?: OperationOptions): Promise<CachedResult<FileChange[]>>;
	abstract getCommitHistory(directory: string, path?: string, options?: OperationOptions): Promise<Commit[]>;
	abstract getCommitInfo(id: string, directory: string, options?: OperationOptions): Promise<Commit>;
	abstract getCommitDiff(id: string, directory: string, options?: OperationOptions): Promise<string>;
	abstract getCommitFile(
		directory: string,
		file: string,
		id?: string,
		options?: OperationOptions,
	): Promise<string>;
	abstract getDiff(directory: string, options?: OperationOptions): Promise<string>;
	abstract getFileDiff(file: string, directory: string, options?: OperationOptions): Promise<string>;
	abstract getFileStatus(
		file: string,
		directory: string,
		options?: OperationOptions,
	): Promise<FileStatusResult>;
	abstract getFileBlame(
		file: string,
		directory: string,
		options?: OperationOptions,
	): Promise<BlameEntry[] | null>;
	abstract getStats(directory: string, options?: OperationOptions): Promise<DiffStats>;
	abstract getStatus(directory: string, options?: OperationOptions): Promise<string>;
	abstract pull(directory: string, options?: OperationOptions): Promise<ExecStatus>;
	abstract revertFile(file: string, directory: string, options?: OperationOptions): Promise<ExecStatus>;
	abstract addPath(path: string, directory: string, options?: OperationOptions): Promise<ExecStatus>;
	abstract removePath(path: string, directory: string, options?: OperationOptions): Promise<ExecStatus>;
	abstract movePath(
		from: string,
		to: string,
		directory: string,
		options?: OperationOptions,
	): Promise<ExecStatus>;
}
