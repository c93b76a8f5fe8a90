/**
 * SCM Abstraction Layer
 *
 * @module scm
 */

export * from "./types.ts";
export { isAbortError, ScmAbortError, ScmCommandError } from "./errors.ts";
export {
	FOSSIL_FILE_STATUS_MAP,
	FOSSIL_STATUS_MAP,
	GIT_STATUS_MAP,
	normalizeFossilStatus,
	normalizeGitStatus,
	normalizeStatus,
} from "./status.ts";
export { Backend, execStatus, type BackendContext, type ScmBackend, type ScmCacheMap } from "./backend.ts";
export { BACKENDS, detectBackend, FossilBackend, GitBackend, type BackendFactory } from "./backends/index.ts";
export { ResultCache, type CacheEntry, type CacheLookup } from "./cache/index.ts";
export * from "./process/index.ts";
export { RepositorySession, type SessionOptions } from "./session.ts";
