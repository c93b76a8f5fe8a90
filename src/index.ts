/**
 * scmkit
 *
 * Version-control metadata for editors and tools: git and fossil backends
 * behind one capability interface, a result cache, cooperative output
 * consumption and a unified-diff line classifier.
 *
 * @module scmkit
 */

export * from "./scm/index.ts";
export { type LineChangeMap, type LineStatus, parseLineChanges } from "./diff/line-changes.ts";
export {
	CONFIG_FILE,
	DEFAULT_CONFIG,
	loadConfig,
	loadConfigOrDefaults,
	ScmConfigSchema,
	type ConfigLoadError,
	type ConfigLoadResult,
	type ScmConfig,
	type ScmConfigInput,
} from "./config/index.ts";
export { bus, type EventName, type EventPayload, type ScmEvents } from "./events/index.ts";
export { createLogger, logger, loggers } from "./observability/index.ts";
export {
	clearExecutableCache,
	nodePathProbe,
	resolveExecutable,
	type ExecutableResolver,
	type PathInfo,
	type PathProbe,
	type PathType,
} from "./platform/index.ts";
export { ChokidarFileWatcher, type FileWatcher, type Unsubscribe } from "./watch/index.ts";
