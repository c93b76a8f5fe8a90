/**
 * @fileoverview Unit Tests for the YAML config loader
 *
 * @module config/loader.test
 */

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { CONFIG_FILE, loadConfig, loadConfigOrDefaults } from "./loader.ts";
import { DEFAULT_CONFIG } from "./schema.ts";

describe("loadConfig", () => {
	let dir: string;

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), "scmkit-config-"));
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	test("uses defaults when the file is missing", () => {
		const result = loadConfig(dir);

		expect(result).toEqual({ success: true, value: DEFAULT_CONFIG, source: "defaults" });
	});

	test("treats an empty file as all defaults", async () => {
		await writeFile(join(dir, CONFIG_FILE), "");

		const result = loadConfig(dir);

		expect(result).toEqual({ success: true, value: DEFAULT_CONFIG, source: "file" });
	});

	test("merges overrides over the defaults", async () => {
		await writeFile(
			join(dir, CONFIG_FILE),
			["process:", "  timeout_ms: 1000", "  env:", "    GIT_DIR: /srv/repo.git", "cache:", "  blame_expiry: 3", ""].join(
				"\n",
			),
		);

		const result = loadConfig(dir);

		expect(result.success).toBe(true);
		if (result.success) {
			expect(result.value.process).toEqual({ timeout_ms: 1000, kill_grace_ms: 5000, env: { GIT_DIR: "/srv/repo.git" } });
			expect(result.value.cache).toEqual({ file_diff_expiry: 1, file_status_expiry: 1, blame_expiry: 3 });
			expect(result.value.executables).toEqual({ git: "git", fossil: "fossil" });
		}
	});

	test("reports a YAML syntax error", async () => {
		await writeFile(join(dir, CONFIG_FILE), "process: [unterminated\n");

		const result = loadConfig(dir);

		expect(result.success).toBe(false);
		if (!result.success) {
			expect(result.error.type).toBe("parse_error");
			expect(result.error.path).toBe(join(dir, CONFIG_FILE));
		}
	});

	test("reports schema violations with their key path", async () => {
		await writeFile(join(dir, CONFIG_FILE), "process:\n  timeout_ms: -5\n");

		const result = loadConfig(dir);

		expect(result.success).toBe(false);
		expect(!result.success && result.error.type).toBe("validation_error");
		if (!result.success && result.error.type === "validation_error") {
			expect(result.error.message).toBe("process.timeout_ms: Number must be greater than 0");
		}
	});

	test("loadConfigOrDefaults falls back on an invalid file", async () => {
		await writeFile(join(dir, CONFIG_FILE), "yield:\n  lines: zero\n");

		expect(loadConfigOrDefaults(dir)).toEqual(DEFAULT_CONFIG);
	});
});
