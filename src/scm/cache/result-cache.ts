/**
 * Result Cache
 *
 * Memoizes expensive query results per (operation, key). Entries either live
 * until invalidated or evict themselves after a number of reads.
 *
 * @module scm/cache/result-cache
 */

import { isAbsolute, relative } from "node:path";
import { bus } from "../../events/index.ts";
import { loggers } from "../../observability/index.ts";
import { isAbortError } from "../errors.ts";
import type { CachedResult } from "../types.ts";

/**
 * Outcome of a cache lookup
 */
export type CacheLookup<T> = { found: true; value: T } | { found: false };

/**
 * A stored value with its owner and optional read budget
 */
export interface CacheEntry<T> {
	operation: string;
	key: string;
	value: T;
	/** Reads left before eviction; absent means valid until invalidated */
	remainingHits?: number;
}

interface InFlight<T> {
	promise: Promise<T>;
}

type Tables<M> = { [K in keyof M]?: Map<string, CacheEntry<M[K]>> };
type Pending<M> = { [K in keyof M]?: Map<string, InFlight<M[K]>> };

/**
 * Typed result cache.
 *
 * `M` maps each operation name to the type of value it caches.
 */
export class ResultCache<M extends object> {
	private tables: Tables<M> = {};
	private pending: Pending<M> = {};

	/**
	 * Read an entry, spending one hit of its expiry budget
	 */
	lookup<K extends keyof M & string>(operation: K, key: string): CacheLookup<M[K]> {
		const table = this.tables[operation];
		const entry = table?.get(key);
		if (!table || !entry) {
			return { found: false };
		}

		if (entry.remainingHits !== undefined) {
			entry.remainingHits--;
			if (entry.remainingHits <= 0) {
				table.delete(key);
				loggers.cache.trace({ operation, key }, "Cache entry expired after last hit");
			}
		}

		return { found: true, value: entry.value };
	}

	/**
	 * Store a value, replacing any previous entry for the same key
	 */
	store<K extends keyof M & string>(operation: K, value: M[K], key: string, expiry?: number): void {
		let table = this.tables[operation];
		if (!table) {
			table = new Map<string, CacheEntry<M[K]>>();
			this.tables[operation] = table;
		}
		table.set(key, { operation, key, value, remainingHits: expiry });
		bus.emit("scm:cache:store", { operation, key, expiry });
	}

	/**
	 * Return the cached value, join a load already running for the same key,
	 * or start `loader`. A completed load is stored once, and only if no
	 * invalidation touched the key while it ran.
	 *
	 * A joined load that was aborted does not fail the joiner: it starts its
	 * own `loader`, which checks the joiner's own signal.
	 */
	async fetch<K extends keyof M & string>(
		operation: K,
		key: string,
		loader: () => Promise<M[K]>,
		expiry?: number,
	): Promise<CachedResult<M[K]>> {
		const hit = this.lookup(operation, key);
		if (hit.found) {
			return { value: hit.value, cached: true };
		}

		const running = this.inFlight(operation, key);
		if (running) {
			loggers.cache.trace({ operation, key }, "Joining in-flight load");
			try {
				return { value: await running.promise, cached: true };
			} catch (error) {
				if (!isAbortError(error)) {
					throw error;
				}
				if (this.inFlight(operation, key) === running) {
					this.pending[operation]?.delete(key);
				}
				loggers.cache.debug({ operation, key }, "Joined load was aborted, loading again");
				return this.fetch(operation, key, loader, expiry);
			}
		}

		const flight: InFlight<M[K]> = { promise: loader() };
		let pendingTable = this.pending[operation];
		if (!pendingTable) {
			pendingTable = new Map<string, InFlight<M[K]>>();
			this.pending[operation] = pendingTable;
		}
		pendingTable.set(key, flight);

		try {
			const value = await flight.promise;
			// clear() and invalidate() may have replaced the pending table meanwhile
			if (this.inFlight(operation, key) === flight) {
				this.store(operation, value, key, expiry);
			}
			return { value, cached: false };
		} finally {
			if (this.inFlight(operation, key) === flight) {
				this.pending[operation]?.delete(key);
			}
		}
	}

	/**
	 * Drop entries by operation and/or key; no arguments clears everything
	 */
	invalidate(operation?: keyof M & string, key?: string): void {
		if (operation === undefined) {
			if (key === undefined) {
				this.clear();
				return;
			}
			for (const name of this.operations()) {
				this.dropKey(name, key);
			}
		} else if (key === undefined) {
			delete this.tables[operation];
			delete this.pending[operation];
		} else {
			this.dropKey(operation, key);
		}
		bus.emit("scm:cache:invalidate", { operation, key, reason: "explicit" });
	}

	/**
	 * Drop every entry scoped to `path`: keys equal to it, keys inside it,
	 * and directory keys that contain it
	 */
	invalidatePath(path: string, reason = "path"): number {
		let dropped = 0;
		for (const operation of this.operations()) {
			const table = this.tables[operation];
			for (const key of [...(table?.keys() ?? [])]) {
				if (overlaps(key, path)) {
					table?.delete(key);
					dropped++;
				}
			}
			const pendingTable = this.pending[operation];
			for (const key of [...(pendingTable?.keys() ?? [])]) {
				if (overlaps(key, path)) {
					pendingTable?.delete(key);
				}
			}
		}
		loggers.cache.debug({ path, dropped, reason }, "Invalidated cache entries for path");
		bus.emit("scm:cache:invalidate", { key: path, reason });
		return dropped;
	}

	/**
	 * Drop all entries and in-flight markers
	 */
	clear(): void {
		this.tables = {};
		this.pending = {};
	}

	/**
	 * Number of stored entries across all operations
	 */
	get size(): number {
		let total = 0;
		for (const operation of this.operations()) {
			total += this.tables[operation]?.size ?? 0;
		}
		return total;
	}

	private inFlight<K extends keyof M & string>(operation: K, key: string): InFlight<M[K]> | undefined {
		return this.pending[operation]?.get(key);
	}

	private dropKey(operation: keyof M & string, key: string): void {
		this.tables[operation]?.delete(key);
		this.pending[operation]?.delete(key);
	}

	private operations(): Array<keyof M & string> {
		const names = new Set<keyof M & string>();
		for (const name of Object.keys(this.tables)) {
			if (isOperation(this.tables, name)) names.add(name);
		}
		for (const name of Object.keys(this.pending)) {
			if (isOperation(this.pending, name)) names.add(name);
		}
		return [...names];
	}
}

function isOperation<M extends object>(
	tables: Tables<M> | Pending<M>,
	name: string,
): name is keyof M & string {
	return Object.hasOwn(tables, name);
}

function isWithin(parent: string, child: string): boolean {
	const rel = relative(parent, child);
	return rel === "" || (!rel.startsWith("..") && !isAbsolute(rel));
}

function overlaps(key: string, path: string): boolean {
	return isWithin(path, key) || isWithin(key, path);
}
