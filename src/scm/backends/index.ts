/**
 * Backend registry
 *
 * @module scm/backends
 */

import { bus } from "../../events/index.ts";
import { loggers } from "../../observability/index.ts";
import type { Backend, BackendContext } from "../backend.ts";
import { FossilBackend } from "./fossil.ts";
import { GitBackend } from "./git.ts";

export type BackendFactory = (context: BackendContext) => Backend;

/**
 * Variants in detection order; the first to claim a directory wins
 */
export const BACKENDS: readonly BackendFactory[] = [
	(context) => new GitBackend(context),
	(context) => new FossilBackend(context),
];

/**
 * Find the backend for a directory, or null when no variant claims it
 */
export async function detectBackend(
	directory: string,
	context: BackendContext,
	factories: readonly BackendFactory[] = BACKENDS,
): Promise<Backend | null> {
	for (const factory of factories) {
		const backend = factory(context);
		if (await backend.detect(directory)) {
			loggers.backend.debug({ directory, backend: backend.name }, "Detected backend");
			bus.emit("scm:backend:detected", { directory, backend: backend.name });
			return backend;
		}
	}
	loggers.backend.debug({ directory }, "No backend claims directory");
	return null;
}

export { FossilBackend } from "./fossil.ts";
export { GitBackend } from "./git.ts";
