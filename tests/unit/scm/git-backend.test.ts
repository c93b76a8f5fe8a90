/**
 * @fileoverview Unit Tests for the git backend
 *
 * Runs every operation against a scripted command runner and an in-memory
 * path probe rooted at /repo.
 *
 * @module tests/unit/scm/git-backend.test
 */

import { afterEach, describe, expect, test, vi } from "vitest";
import { bus } from "../../../src/events/index.ts";
import { GitBackend } from "../../../src/scm/backends/git.ts";
import { ScmAbortError } from "../../../src/scm/errors.ts";
import { FakeProbe, FakeRunner, ManualWatcher, deferred, fakeContext } from "../../helpers/scm.ts";

const probe = new FakeProbe(
	{
		"/repo": [".git", "src", "vendor"],
		"/repo/src": ["a.ts", "b.ts"],
		"/repo/vendor/lib": [".git", "x.c"],
	},
	["/repo/src/a.ts", "/repo/src/b.ts", "/repo/vendor/lib/x.c"],
);

function setup(configure: (runner: FakeRunner) => void = () => {}) {
	const runner = new FakeRunner().toplevel("/repo").toplevel("/repo/src", "/repo");
	configure(runner);
	const context = fakeContext(runner, probe);
	return { runner, context, backend: new GitBackend(context) };
}

describe("GitBackend", () => {
	afterEach(() => {
		bus.clear();
	});

	describe("detection and roots", () => {
		test("claims a directory with a .git entry when git resolves", async () => {
			const { backend } = setup();

			expect(await backend.detect("/repo")).toBe(true);
			expect(await backend.detect("/repo/src")).toBe(false);
		});

		test("does not claim a directory when the executable is missing", async () => {
			const runner = new FakeRunner();
			const backend = new GitBackend(fakeContext(runner, probe, { resolver: () => null }));

			expect(await backend.detect("/repo")).toBe(false);
		});

		test("supports staging", () => {
			expect(setup().backend.hasStaging()).toBe(true);
		});

		test("resolves a file to the toplevel of its checkout", async () => {
			const { backend, runner } = setup();

			expect(await backend.repoRoot("/repo/src/a.ts")).toBe("/repo");
			expect(runner.calls[0]).toEqual({ command: "git", args: ["rev-parse", "--show-toplevel"], cwd: "/repo/src" });
		});

		test("falls back to the directory when rev-parse fails", async () => {
			const { backend } = setup();

			expect(await backend.repoRoot("/repo/vendor/lib")).toBe("/repo/vendor/lib");
		});
	});

	describe("getChanges", () => {
		const statusOutput = [" M src/b.ts", "M  src/a.ts", "R  old.ts -> new.ts", "?? notes.txt", "UU conflict.ts", ""].join(
			"\n",
		);

		test("normalizes status output and marks staged files", async () => {
			const { backend } = setup((runner) =>
				runner
					.on(["diff", "--name-only", "--cached"], { stdout: "src/a.ts\nnew.ts\n" }, "/repo")
					.on(["status", "--short"], { stdout: statusOutput }, "/repo")
					.on(["submodule", "foreach", "--recursive"], { stdout: "" }, "/repo"),
			);

			const { value, cached } = await backend.getChanges("/repo");

			expect(cached).toBe(false);
			expect(value).toEqual([
				{ status: "edited", path: "/repo/src/b.ts", staged: false },
				{ status: "edited", path: "/repo/src/a.ts", staged: true },
				{ status: "renamed", path: "/repo/old.ts", newPath: "/repo/new.ts", staged: true },
				{ status: "untracked", path: "/repo/notes.txt", staged: false },
			]);
		});

		test("serves the second query from the cache", async () => {
			const { backend, runner } = setup((runner) =>
				runner
					.on(["status", "--short"], { stdout: " M src/b.ts\n" }, "/repo")
					.on(["submodule", "foreach", "--recursive"], { stdout: "" }, "/repo"),
			);

			await backend.getChanges("/repo");
			const second = await backend.getChanges("/repo");

			expect(second.cached).toBe(true);
			expect(runner.callsOf("status")).toHaveLength(1);
		});

		test("appends the changes of every submodule that exists", async () => {
			const { backend, runner } = setup((runner) =>
				runner
					.toplevel("/repo/vendor/lib")
					.on(["status", "--short"], { stdout: " M src/b.ts\n" }, "/repo")
					.on(["submodule", "foreach", "--recursive"], { stdout: "Entering 'vendor/lib'\nEntering 'missing'\n" }, "/repo")
					.on(["status", "--short"], { stdout: "A  x.c\n" }, "/repo/vendor/lib")
					.on(["diff", "--name-only", "--cached"], { stdout: "x.c\n" }, "/repo/vendor/lib"),
			);

			const { value } = await backend.getChanges("/repo");

			expect(value).toEqual([
				{ status: "edited", path: "/repo/src/b.ts", staged: false },
				{ status: "added", path: "/repo/vendor/lib/x.c", staged: true },
			]);
			expect(runner.callsOf("status").map((call) => call.cwd)).toEqual(["/repo", "/repo/vendor/lib"]);
		});

		test("returns collections the caller may modify without touching the cache", async () => {
			const { backend, runner } = setup((runner) =>
				runner
					.on(["diff", "--name-only", "--cached"], { stdout: "src/a.ts\n" }, "/repo")
					.on(["status", "--short"], { stdout: "M  src/a.ts\n" }, "/repo")
					.on(["submodule", "foreach", "--recursive"], { stdout: "" }, "/repo"),
			);

			const first = await backend.getChanges("/repo");
			first.value.push({ status: "added", path: "/repo/extra.ts", staged: false });
			first.value[0].staged = false;
			const staged = await backend.getStaged("/repo");
			staged.add("/repo/extra.ts");

			expect((await backend.getChanges("/repo")).value).toEqual([
				{ status: "edited", path: "/repo/src/a.ts", staged: true },
			]);
			expect(await backend.getStaged("/repo")).toEqual(new Set(["/repo/src/a.ts"]));
			expect(runner.callsOf("status")).toHaveLength(1);
		});

		test("delivers the aggregate only after every submodule query settles", async () => {
			const gate = deferred<{ stdout: string }>();
			const { backend } = setup((runner) =>
				runner
					.toplevel("/repo/vendor/lib")
					.on(["status", "--short"], { stdout: "" }, "/repo")
					.on(["submodule", "foreach", "--recursive"], { stdout: "Entering 'vendor/lib'\n" }, "/repo")
					.on(["status", "--short"], () => gate.promise, "/repo/vendor/lib"),
			);

			const settled = vi.fn();
			const pending = backend.getChanges("/repo").then(settled);
			await new Promise((resolve) => setTimeout(resolve, 10));
			expect(settled).not.toHaveBeenCalled();

			gate.resolve({ stdout: " M x.c\n" });
			await pending;
			expect(settled).toHaveBeenCalledWith({
				value: [{ status: "edited", path: "/repo/vendor/lib/x.c", staged: false }],
				cached: false,
			});
		});
	});

	describe("queries", () => {
		test("getBranch reads the abbreviated HEAD", async () => {
			const { backend } = setup((runner) => runner.on(["rev-parse", "--abbrev-ref", "HEAD"], { stdout: "main\n" }));

			expect(await backend.getBranch("/repo")).toBe("main");
		});

		test("getBranch is null outside a checkout", async () => {
			const { backend } = setup();

			expect(await backend.getBranch("/repo")).toBeNull();
		});

		test("getCommitHistory keeps tool order and limits to a path", async () => {
			const { backend, runner } = setup((runner) =>
				runner.on(
					["log", "--oneline", "--no-decorate", "--pretty=format:'%an' %H %ct %s", "--", "/repo/src/a.ts"],
					{ stdout: "'Jane' 2222 notatime Second\n'Joe' 1111 notatime First\n" },
				),
			);

			const commits = await backend.getCommitHistory("/repo", "src/a.ts");

			expect(commits.map((commit) => commit.hash)).toEqual(["2222", "1111"]);
			expect(commits[0]).toEqual({ author: "Jane", hash: "2222", date: "notatime", summary: "Second" });
			expect(runner.callsOf("log")[0].cwd).toBe("/repo");
		});

		test("getCommitInfo parses show output", async () => {
			const { backend } = setup((runner) =>
				runner.on(["show", "--no-patch", "abc"], {
					stdout: "commit abc\nAuthor: Jane <jane@example.com>\nDate:   today\n\n    Summary\n",
				}),
			);

			expect(await backend.getCommitInfo("abc", "/repo")).toEqual({
				hash: "abc",
				author: "Jane <jane@example.com>",
				date: "today",
				summary: "Summary",
			});
		});

		test("getCommitFile shows a path relative to the root at a revision", async () => {
			const { backend } = setup((runner) =>
				runner.on(["show", "HEAD:src/a.ts"], { stdout: "old content\n" }).on(["show", "abc:src/a.ts"], { stdout: "v1\n" }),
			);

			expect(await backend.getCommitFile("/repo", "src/a.ts")).toBe("old content\n");
			expect(await backend.getCommitFile("/repo", "/repo/src/a.ts", "abc")).toBe("v1\n");
		});

		test("getFileDiff caches for a single read", async () => {
			const { backend, runner } = setup((runner) => runner.on(["diff", "/repo/src/a.ts"], { stdout: "@@ -1 +1 @@\n" }));

			await backend.getFileDiff("src/a.ts", "/repo");
			await backend.getFileDiff("src/a.ts", "/repo");
			await backend.getFileDiff("src/a.ts", "/repo");

			expect(runner.callsOf("diff")).toHaveLength(2);
		});

		test("getFileStatus maps the short status code", async () => {
			const { backend } = setup((runner) =>
				runner
					.on(["status", "-s", "/repo/src/a.ts"], { stdout: "MM src/a.ts\n" })
					.on(["status", "-s", "/repo/src/b.ts"], { stdout: "" }),
			);

			expect(await backend.getFileStatus("src/a.ts", "/repo")).toBe("edited");
			expect(await backend.getFileStatus("src/b.ts", "/repo")).toBe("unchanged");
		});

		test("getFileBlame returns one entry per line, or null on failure", async () => {
			const { backend } = setup((runner) =>
				runner.on(["blame", "/repo/src/a.ts"], {
					stdout: "abc1234 (Jane 2024-01-05 10:00:00 +0000 1) a\n^def5678 (Joe 2023-12-31 09:00:00 +0000 2) b\n",
				}),
			);

			expect(await backend.getFileBlame("src/a.ts", "/repo")).toEqual([
				{ commit: "abc1234", author: "Jane", date: "2024-01-05" },
				{ commit: "def5678", author: "Joe", date: "2023-12-31" },
			]);
			expect(await backend.getFileBlame("src/b.ts", "/repo")).toBeNull();
		});

		test("a blame that joined an aborted one runs again with its own signal", async () => {
			const gate = deferred<{ stdout: string }>();
			let blames = 0;
			const { backend } = setup((runner) =>
				runner.on(["blame", "/repo/src/a.ts"], () => {
					blames++;
					return blames === 1 ? gate.promise : Promise.resolve({ stdout: "abc1234 (Jane 2024-01-05 10:00:00 +0000 1) a\n" });
				}),
			);
			const controller = new AbortController();

			const aborted = backend.getFileBlame("src/a.ts", "/repo", { signal: controller.signal });
			const joined = backend.getFileBlame("src/a.ts", "/repo");
			await new Promise((resolve) => setTimeout(resolve, 10));
			controller.abort();
			gate.reject(new ScmAbortError());

			await expect(aborted).rejects.toBeInstanceOf(ScmAbortError);
			expect(await joined).toEqual([{ commit: "abc1234", author: "Jane", date: "2024-01-05" }]);
			expect(blames).toBe(2);
		});

		test("getStats sums numstat rows and skips binary files", async () => {
			const { backend } = setup((runner) =>
				runner.on(["diff", "--numstat"], { stdout: "3\t1\tsrc/a.ts\n-\t-\tlogo.png\n2\t0\tsrc/b.ts\n" }),
			);

			expect(await backend.getStats("/repo")).toEqual({ inserts: 5, deletes: 1 });
		});

		test("read failures degrade to empty results", async () => {
			const { backend } = setup();

			expect(await backend.getDiff("/repo")).toBe("");
			expect(await backend.getStatus("/repo")).toBe("");
			expect(await backend.getCommitHistory("/repo")).toEqual([]);
			expect(await backend.getStats("/repo")).toEqual({ inserts: 0, deletes: 0 });
		});

		test("rejects with ScmAbortError when the signal has fired", async () => {
			const { backend, runner } = setup();
			const controller = new AbortController();
			controller.abort();

			await expect(backend.getBranch("/repo", { signal: controller.signal })).rejects.toBeInstanceOf(ScmAbortError);
			expect(runner.calls).toHaveLength(0);
		});
	});

	describe("mutations", () => {
		test("stageFile reports success and invalidates the repository", async () => {
			const { backend, context } = setup((runner) => runner.on(["add", "/repo/src/a.ts"], { stdout: "" }));
			context.cache.store("getChanges", [], "/repo");
			const mutated = vi.fn();
			bus.on("scm:path:mutated", mutated);

			const status = await backend.stageFile("src/a.ts", "/repo");

			expect(status).toEqual({ success: true, message: "" });
			expect(context.cache.lookup("getChanges", "/repo").found).toBe(false);
			expect(mutated).toHaveBeenCalledWith({ operation: "stage", paths: ["/repo/src/a.ts"], success: true });
		});

		test("a failed mutation reports stderr, else stdout, and still invalidates", async () => {
			const { backend, context } = setup((runner) =>
				runner
					.on(["pull"], { exitCode: 1, stderr: "fatal: no remote\n", stdout: "ignored" })
					.on(["restore", "/repo/src/a.ts"], { exitCode: 1, stdout: "only stdout" }),
			);
			context.cache.store("getFileDiff", "patch", "/repo/src/a.ts");

			expect(await backend.pull("/repo")).toEqual({ success: false, message: "fatal: no remote\n" });
			expect(await backend.revertFile("src/a.ts", "/repo")).toEqual({ success: false, message: "only stdout" });
			expect(context.cache.size).toBe(0);
		});

		test.each([
			["unstageFile", ["restore", "--staged", "/repo/src/a.ts"]],
			["addPath", ["add", "/repo/src/a.ts"]],
			["removePath", ["rm", "-r", "--cached", "/repo/src/a.ts"]],
		] as const)("%s issues %j", async (operation, args) => {
			const { backend, runner } = setup((runner) => runner.on([...args], { stdout: "" }));

			const status = await backend[operation]("src/a.ts", "/repo");

			expect(status.success).toBe(true);
			expect(runner.calls.at(-1)?.args).toEqual(args);
		});

		test("movePath passes both absolute paths", async () => {
			const { backend, runner } = setup((runner) => runner.on(["mv", "/repo/src/a.ts", "/repo/src/c.ts"], { stdout: "" }));

			expect(await backend.movePath("src/a.ts", "src/c.ts", "/repo")).toEqual({ success: true, message: "" });
			expect(runner.calls.at(-1)?.cwd).toBe("/repo");
		});
	});

	describe("watching", () => {
		test("clears repository entries when the control path changes", async () => {
			const watcher = new ManualWatcher();
			const runner = new FakeRunner();
			const context = fakeContext(runner, probe, { watcher });
			const backend = new GitBackend(context);
			context.cache.store("getChanges", [], "/repo");

			backend.watchProject("/repo");
			watcher.fire("/repo/.git", "/repo/.git/index");

			expect(context.cache.lookup("getChanges", "/repo").found).toBe(false);

			await backend.unwatchProject("/repo");
			expect(watcher.watched.size).toBe(0);
		});
	});
});
