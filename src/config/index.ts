export {
	DEFAULT_CONFIG,
	ScmConfigSchema,
	type CacheConfig,
	type ScmConfig,
	type ScmConfigInput,
	type YieldConfig,
} from "./schema.ts";
export {
	CONFIG_FILE,
	loadConfig,
	loadConfigOrDefaults,
	type ConfigLoadError,
	type ConfigLoadResult,
} from "./loader.ts";
