/**
 * @fileoverview Executable Resolver
 *
 * Resolves a version-control command to an executable on PATH, caching
 * answers so repeated detection does not re-run `which`/`where`.
 *
 * @module platform/executable-resolver
 */

import { spawnSync } from "node:child_process";
import { existsSync } from "node:fs";
import { isAbsolute } from "node:path";

/**
 * Resolves a command name to an executable path, or null when missing
 */
export type ExecutableResolver = (command: string) => string | null;

interface ResolverCache {
	/** Cached resolution results */
	resolved: Map<string, string | null>;
	/** Timestamp of last check */
	lastChecked: number;
	/** Cache validity duration in milliseconds */
	cacheDuration: number;
}

/**
 * Cache for executable lookups
 * Avoids repeated `which`/`where` calls during a single session
 */
const resolverCache: ResolverCache = {
	resolved: new Map(),
	lastChecked: 0,
	cacheDuration: 60000, // 1 minute cache
};

/**
 * Look a command up on PATH
 *
 * @param command - Command name to check
 * @param isWindows - Whether running on Windows
 * @returns First matching path, or null
 */
function lookupOnPath(command: string, isWindows: boolean): string | null {
	try {
		const checkCommand = isWindows ? "where" : "which";
		const result = spawnSync(checkCommand, [command], {
			stdio: "pipe",
			timeout: 5000,
			encoding: "utf8",
		});
		if (result.status !== 0) {
			return null;
		}
		const first = result.stdout.split(/\r?\n/).find((line) => line.trim().length > 0);
		return first?.trim() ?? command;
	} catch {
		return null;
	}
}

/**
 * Resolve a command to an executable, with caching
 *
 * Absolute paths are checked for existence instead of searched on PATH.
 */
export const resolveExecutable: ExecutableResolver = (command) => {
	if (isAbsolute(command)) {
		return existsSync(command) ? command : null;
	}

	const now = Date.now();

	// Check cache validity
	if (now - resolverCache.lastChecked < resolverCache.cacheDuration) {
		const cached = resolverCache.resolved.get(command);
		if (cached !== undefined) {
			return cached;
		}
	}

	// Perform check and cache result
	const resolved = lookupOnPath(command, process.platform === "win32");
	resolverCache.resolved.set(command, resolved);
	resolverCache.lastChecked = now;

	return resolved;
};

/**
 * Clear the resolver cache
 * Useful for testing or when PATH changes
 */
export function clearExecutableCache(): void {
	resolverCache.resolved.clear();
	resolverCache.lastChecked = 0;
}
