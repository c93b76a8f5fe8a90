/**
 * chokidar-backed FileWatcher with per-path debouncing
 *
 * @module watch/chokidar-watcher
 */

import { type FSWatcher, watch as watchPath } from "chokidar";
import { loggers } from "../observability/index.ts";
import type { FileWatcher, Unsubscribe } from "./types.ts";

export interface ChokidarWatcherOptions {
	/** Quiet period before a burst of events is reported, in milliseconds */
	debounceMs?: number;
}

/**
 * Object store writes and lock files never change what a query reports
 */
export const IGNORED_PATHS = /[\\/]objects[\\/]|\.lock$/;

interface Subscription {
	watcher: FSWatcher;
	timer?: ReturnType<typeof setTimeout>;
}

export class ChokidarFileWatcher implements FileWatcher {
	private readonly debounceMs: number;
	private readonly subscriptions = new Set<Subscription>();

	constructor(options: ChokidarWatcherOptions = {}) {
		this.debounceMs = options.debounceMs ?? 200;
	}

	watch(path: string, onChange: (changedPath: string) => void): Unsubscribe {
		const watcher = watchPath(path, {
			ignored: IGNORED_PATHS,
			ignoreInitial: true,
			persistent: true,
		});
		const subscription: Subscription = { watcher };

		watcher.on("all", (_event, changedPath) => {
			if (subscription.timer) {
				clearTimeout(subscription.timer);
			}
			subscription.timer = setTimeout(() => {
				subscription.timer = undefined;
				onChange(changedPath);
			}, this.debounceMs);
		});

		watcher.on("error", (error) => {
			loggers.watch.warn({ path, error }, "File watcher error");
		});

		this.subscriptions.add(subscription);
		loggers.watch.debug({ path }, "Watching path");

		return async () => {
			await this.release(subscription);
		};
	}

	async close(): Promise<void> {
		await Promise.all([...this.subscriptions].map((subscription) => this.release(subscription)));
	}

	private async release(subscription: Subscription): Promise<void> {
		if (!this.subscriptions.delete(subscription)) {
			return;
		}
		if (subscription.timer) {
			clearTimeout(subscription.timer);
		}
		await subscription.watcher.close();
	}
}
