/**
 * Repository Session
 *
 * Context object for one detected repository root: owns the result cache,
 * the backend bound to it and the change-notification subscription on the
 * backend's control-metadata path.
 *
 * @module scm/session
 */

import { resolve } from "node:path";
import { type ScmConfig, loadConfig } from "../config/index.ts";
import { bus } from "../events/index.ts";
import { loggers } from "../observability/index.ts";
import {
	type ExecutableResolver,
	type PathProbe,
	nodePathProbe,
	resolveExecutable,
} from "../platform/index.ts";
import { ChokidarFileWatcher, type FileWatcher } from "../watch/index.ts";
import type { Backend, BackendContext, ScmCacheMap } from "./backend.ts";
import { BACKENDS, type BackendFactory, detectBackend } from "./backends/index.ts";
import { ResultCache } from "./cache/index.ts";
import { type CommandRunner, runCommand } from "./process/index.ts";
import { createScmError, err, ok, type ScmResult } from "./types.ts";

export interface SessionOptions {
	/** Configuration; loaded from the directory's config file when absent */
	config?: ScmConfig;
	runner?: CommandRunner;
	probe?: PathProbe;
	resolver?: ExecutableResolver;
	/** Watcher to subscribe with; a chokidar watcher is created when absent */
	watcher?: FileWatcher;
	/** Subscribe to control-metadata changes (default true) */
	watch?: boolean;
	backends?: readonly BackendFactory[];
}

export class RepositorySession {
	readonly directory: string;
	readonly backend: Backend;
	readonly cache: ResultCache<ScmCacheMap>;
	private readonly ownedWatcher?: FileWatcher;
	private disposed = false;

	private constructor(
		directory: string,
		backend: Backend,
		cache: ResultCache<ScmCacheMap>,
		ownedWatcher?: FileWatcher,
	) {
		this.directory = directory;
		this.backend = backend;
		this.cache = cache;
		this.ownedWatcher = ownedWatcher;
	}

	/**
	 * Detect the backend for `directory` and start watching it.
	 *
	 * Fails with NOT_A_REPOSITORY when no backend claims the directory and
	 * INVALID_CONFIG when the config file does not validate.
	 */
	static async open(directory: string, options: SessionOptions = {}): Promise<ScmResult<RepositorySession>> {
		const root = resolve(directory);

		let config = options.config;
		if (!config) {
			const loaded = loadConfig(root);
			if (!loaded.success) {
				return err(
					createScmError("INVALID_CONFIG", `Invalid configuration in ${loaded.error.path}`, {
						context: { error: loaded.error },
					}),
				);
			}
			config = loaded.value;
		}

		const watchEnabled = options.watch ?? true;
		let ownedWatcher: FileWatcher | undefined;
		let watcher = options.watcher;
		if (!watcher && watchEnabled) {
			ownedWatcher = new ChokidarFileWatcher({ debounceMs: config.watch.debounce_ms });
			watcher = ownedWatcher;
		}

		const cache = new ResultCache<ScmCacheMap>();
		const context: BackendContext = {
			config,
			cache,
			runner: options.runner ?? runCommand,
			probe: options.probe ?? nodePathProbe,
			resolver: options.resolver ?? resolveExecutable,
			watcher: watchEnabled ? watcher : undefined,
		};

		const backend = await detectBackend(root, context, options.backends ?? BACKENDS);
		if (!backend) {
			await ownedWatcher?.close();
			return err(createScmError("NOT_A_REPOSITORY", `No version control detected in ${root}`));
		}

		backend.watchProject(root);
		loggers.session.info({ directory: root, backend: backend.name }, "Session opened");
		return ok(new RepositorySession(root, backend, cache, ownedWatcher));
	}

	/**
	 * Drop cached results: those scoped to `path` when given, otherwise all
	 */
	invalidate(path?: string): void {
		if (path === undefined) {
			this.cache.clear();
			bus.emit("scm:cache:invalidate", { reason: "session" });
			return;
		}
		this.cache.invalidatePath(resolve(this.directory, path), "session");
	}

	/**
	 * Stop watching and release the cache
	 */
	async dispose(): Promise<void> {
		if (this.disposed) {
			return;
		}
		this.disposed = true;
		await this.backend.unwatchProject(this.directory);
		await this.ownedWatcher?.close();
		this.cache.clear();
		loggers.session.debug({ directory: this.directory }, "Session disposed");
	}
}
