/**
 * @fileoverview Path Probe
 *
 * File-existence and type queries used while resolving repository roots
 * and detecting backends.
 *
 * @module platform/path-probe
 */

import { readdir, stat } from "node:fs/promises";

/**
 * Kind of filesystem entry
 */
export type PathType = "file" | "dir";

/**
 * Result of a path query
 */
export interface PathInfo {
	type: PathType;
	/** Size in bytes */
	size: number;
	/** Last modification time in milliseconds */
	modified: number;
}

/**
 * Filesystem queries the SCM layer depends on
 */
export interface PathProbe {
	/** Type of the entry at `path`, or null when it does not exist */
	getInfo(path: string): Promise<PathInfo | null>;
	/** Entry names in a directory, or null when it cannot be listed */
	list(directory: string): Promise<string[] | null>;
}

/**
 * PathProbe backed by node:fs
 */
export const nodePathProbe: PathProbe = {
	async getInfo(path) {
		try {
			const info = await stat(path);
			return {
				type: info.isDirectory() ? "dir" : "file",
				size: info.size,
				modified: info.mtimeMs,
			};
		} catch {
			return null;
		}
	},

	async list(directory) {
		try {
			return await readdir(directory);
		} catch {
			return null;
		}
	},
};
