/**
 * @fileoverview Unit Tests for status normalization
 *
 * @module scm/status.test
 */

import { describe, expect, test } from "vitest";
import {
	FOSSIL_FILE_STATUS_MAP,
	normalizeFossilStatus,
	normalizeGitStatus,
	normalizeStatus,
} from "./status.ts";

describe("normalizeGitStatus", () => {
	test.each([
		["A", "added"],
		["D", "deleted"],
		["M", "edited"],
		["R", "renamed"],
		["??", "untracked"],
	])("maps %s to %s", (token, status) => {
		expect(normalizeGitStatus(token)).toBe(status);
	});

	test("takes the first recognized column of a two-column code", () => {
		expect(normalizeGitStatus("MM")).toBe("edited");
		expect(normalizeGitStatus("AM")).toBe("added");
		expect(normalizeGitStatus("RM")).toBe("renamed");
		expect(normalizeGitStatus("UD")).toBe("deleted");
	});

	test("leaves unknown tokens unmapped", () => {
		expect(normalizeGitStatus("UU")).toBeUndefined();
		expect(normalizeGitStatus("!!")).toBeUndefined();
		expect(normalizeGitStatus("")).toBeUndefined();
	});
});

describe("normalizeFossilStatus", () => {
	test.each([
		["ADDED", "added"],
		["DELETED", "deleted"],
		["EDITED", "edited"],
		["RENAMED", "renamed"],
		["EXTRA", "untracked"],
	])("maps %s to %s", (token, status) => {
		expect(normalizeFossilStatus(token)).toBe(status);
	});

	test("leaves unknown labels unmapped", () => {
		expect(normalizeFossilStatus("CONFLICT")).toBeUndefined();
		expect(normalizeFossilStatus("edited")).toBeUndefined();
	});
});

describe("normalizeStatus", () => {
	test("maps fossil file-info tokens", () => {
		expect(normalizeStatus("new", FOSSIL_FILE_STATUS_MAP)).toBe("added");
		expect(normalizeStatus("unchanged", FOSSIL_FILE_STATUS_MAP)).toBe("unchanged");
		expect(normalizeStatus("unknown", FOSSIL_FILE_STATUS_MAP)).toBe("untracked");
	});

	test("ignores inherited object keys", () => {
		expect(normalizeStatus("toString", FOSSIL_FILE_STATUS_MAP)).toBeUndefined();
	});
});
