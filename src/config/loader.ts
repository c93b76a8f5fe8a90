/**
 * @fileoverview YAML Config Loader
 *
 * Reads `.scmkit.yaml` from a project directory and validates it against
 * the zod schema. A missing file yields the default configuration.
 *
 * @module config/loader
 */

import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import YAML from "yaml";
import { loggers } from "../observability/index.ts";
import { DEFAULT_CONFIG, type ScmConfig, ScmConfigSchema } from "./schema.ts";

/**
 * Config file name looked up in the project directory
 */
export const CONFIG_FILE = ".scmkit.yaml";

/**
 * Configuration load error types
 */
export type ConfigLoadError =
	| { type: "parse_error"; path: string; message: string }
	| { type: "validation_error"; path: string; message: string }
	| { type: "permission_denied"; path: string }
	| { type: "unknown"; path: string; message: string };

/**
 * Configuration load result
 */
export type ConfigLoadResult =
	| { success: true; value: ScmConfig; source: "file" | "defaults" }
	| { success: false; error: ConfigLoadError };

/**
 * Load configuration for a project directory
 */
export function loadConfig(workDir: string, fileName = CONFIG_FILE): ConfigLoadResult {
	const configPath = join(workDir, fileName);

	if (!existsSync(configPath)) {
		loggers.config.debug({ configPath }, "No config file, using defaults");
		return { success: true, value: DEFAULT_CONFIG, source: "defaults" };
	}

	let content: string;
	try {
		content = readFileSync(configPath, "utf-8");
	} catch (error) {
		if (isErrnoException(error) && error.code === "EACCES") {
			return { success: false, error: { type: "permission_denied", path: configPath } };
		}
		return {
			success: false,
			error: { type: "unknown", path: configPath, message: describe(error) },
		};
	}

	let parsed: unknown;
	try {
		// An empty document parses to null
		parsed = YAML.parse(content) ?? {};
	} catch (error) {
		return {
			success: false,
			error: { type: "parse_error", path: configPath, message: describe(error) },
		};
	}

	const validation = ScmConfigSchema.safeParse(parsed);
	if (!validation.success) {
		const message = validation.error.issues
			.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
			.join("; ");
		return { success: false, error: { type: "validation_error", path: configPath, message } };
	}

	loggers.config.debug({ configPath }, "Loaded config file");
	return { success: true, value: validation.data, source: "file" };
}

/**
 * Load configuration, falling back to defaults on any error
 */
export function loadConfigOrDefaults(workDir: string): ScmConfig {
	const result = loadConfig(workDir);
	if (result.success) {
		return result.value;
	}
	loggers.config.warn({ error: result.error }, "Invalid scmkit config, using defaults");
	return DEFAULT_CONFIG;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
	return error instanceof Error && "code" in error;
}

function describe(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
