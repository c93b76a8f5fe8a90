/**
 * @fileoverview Config Schema
 *
 * Zod schema for scmkit configuration. Every key has a default, so an
 * empty document parses to the full default configuration.
 *
 * @module config/schema
 */

import { z } from "zod";

/**
 * Subprocess execution settings
 */
export const ProcessConfigSchema = z.object({
	timeout_ms: z.number().int().positive().default(30_000),
	kill_grace_ms: z.number().int().nonnegative().default(5_000),
	env: z.record(z.string()).default({}),
});

/**
 * Executable names or absolute paths per backend
 */
export const ExecutablesConfigSchema = z.object({
	git: z.string().min(1).default("git"),
	fossil: z.string().min(1).default("fossil"),
});

/**
 * Number of consumed lines between cooperative yields
 */
export const YieldConfigSchema = z.object({
	lines: z.number().int().positive().default(50),
	history: z.number().int().positive().default(100),
	blame: z.number().int().positive().default(100),
	commit_info: z.number().int().positive().default(10),
});

/**
 * Hit-count expiry of per-file cache entries
 */
export const CacheConfigSchema = z.object({
	file_diff_expiry: z.number().int().positive().default(1),
	file_status_expiry: z.number().int().positive().default(1),
	blame_expiry: z.number().int().positive().default(10),
});

export const GitConfigSchema = z.object({
	submodule_concurrency: z.number().int().positive().default(4),
});

export const WatchConfigSchema = z.object({
	debounce_ms: z.number().int().nonnegative().default(200),
});

/**
 * Complete configuration schema
 */
export const ScmConfigSchema = z.object({
	process: ProcessConfigSchema.default({}),
	executables: ExecutablesConfigSchema.default({}),
	yield: YieldConfigSchema.default({}),
	cache: CacheConfigSchema.default({}),
	git: GitConfigSchema.default({}),
	watch: WatchConfigSchema.default({}),
});

export type ScmConfig = z.infer<typeof ScmConfigSchema>;
export type ScmConfigInput = z.input<typeof ScmConfigSchema>;
export type YieldConfig = z.infer<typeof YieldConfigSchema>;
export type CacheConfig = z.infer<typeof CacheConfigSchema>;

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: ScmConfig = ScmConfigSchema.parse({});
