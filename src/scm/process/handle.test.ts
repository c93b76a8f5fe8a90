/**
 * @fileoverview Unit Tests for ProcessHandle
 *
 * @module scm/process/handle.test
 */

import { describe, expect, test } from "vitest";
import { ScmAbortError, ScmCommandError, isAbortError } from "../errors.ts";
import { err, ok } from "../types.ts";
import { EXIT_SPAWN_FAILED, EXIT_TIMED_OUT, ProcessHandle } from "./handle.ts";

function handle(stdout: string, signal?: AbortSignal): ProcessHandle {
	return new ProcessHandle("git", ["log"], { exitCode: 0, stdout, stderr: "", timedOut: false }, signal);
}

async function drain(proc: ProcessHandle, yieldEvery?: number): Promise<Array<[number, string]>> {
	const lines: Array<[number, string]> = [];
	for await (const entry of proc.lineSequence("stdout", yieldEvery)) {
		lines.push(entry);
	}
	return lines;
}

describe("ProcessHandle", () => {
	describe("lineSequence", () => {
		test("yields indexed lines from 1 without a trailing empty line", async () => {
			expect(await drain(handle("one\ntwo\nthree\n"))).toEqual([
				[1, "one"],
				[2, "two"],
				[3, "three"],
			]);
		});

		test("keeps an unterminated last line and strips carriage returns", async () => {
			expect(await drain(handle("one\r\ntwo"))).toEqual([
				[1, "one"],
				[2, "two"],
			]);
		});

		test("keeps empty lines in the middle", async () => {
			expect(await drain(handle("a\n\nb\n"))).toEqual([
				[1, "a"],
				[2, ""],
				[3, "b"],
			]);
		});

		test("yields nothing for empty output", async () => {
			expect(await drain(handle(""))).toEqual([]);
		});

		test("is not restartable", async () => {
			const sequence = handle("a\nb\n").lineSequence("stdout");
			const first = await sequence.next();
			await sequence.return(undefined);
			const after = await sequence.next();

			expect(first.value).toEqual([1, "a"]);
			expect(after.done).toBe(true);
		});

		test("throws at the next yield point once aborted", async () => {
			const controller = new AbortController();
			const stdout = Array.from({ length: 200 }, (_, index) => `line ${index + 1}`).join("\n");
			const seen: number[] = [];

			const consume = async () => {
				for await (const [index] of handle(stdout, controller.signal).lineSequence("stdout", 50)) {
					seen.push(index);
					if (index === 10) controller.abort();
				}
			};

			await expect(consume()).rejects.toBeInstanceOf(ScmAbortError);
			expect(seen).toHaveLength(50);
		});
	});

	describe("fromResult", () => {
		test("wraps a completed run", () => {
			const proc = ProcessHandle.fromResult(
				"git",
				["status"],
				ok({ exitCode: 0, stdout: "clean", stderr: "", timedOut: false, duration: 3 }),
			);

			expect(proc.succeeded).toBe(true);
			expect(proc.bufferedOutput("stdout")).toBe("clean");
		});

		test("folds a spawn failure into exit code 127", () => {
			const proc = ProcessHandle.fromResult(
				"git",
				["status"],
				err(new ScmCommandError("COMMAND_FAILED", "Failed to execute git: spawn git ENOENT", { command: "git", args: ["status"] })),
			);

			expect(proc.exitCode).toBe(EXIT_SPAWN_FAILED);
			expect(proc.bufferedOutput("stderr")).toBe("Failed to execute git: spawn git ENOENT");
			expect(proc.bufferedOutput("stdout")).toBe("");
		});

		test("folds a timeout into exit code 124", () => {
			const proc = ProcessHandle.fromResult(
				"git",
				["pull"],
				err(new ScmCommandError("COMMAND_TIMEOUT", "git timed out after 100ms", { command: "git", args: ["pull"] })),
			);

			expect(proc.exitCode).toBe(EXIT_TIMED_OUT);
			expect(proc.timedOut).toBe(true);
			expect(proc.succeeded).toBe(false);
		});

		test("rethrows an abort", () => {
			let thrown: unknown;
			try {
				ProcessHandle.fromResult("git", ["log"], err(new ScmAbortError()));
			} catch (error) {
				thrown = error;
			}

			expect(isAbortError(thrown)).toBe(true);
			expect(isAbortError(new Error("spawn git ENOENT"))).toBe(false);
		});
	});
});
