/**
 * @fileoverview scmkit CLI Program
 *
 * Commander program that opens a repository session for the target
 * directory, runs one backend query and prints the result.
 *
 * @module cli/program
 */

import { Command } from "commander";
import { parseLineChanges } from "../diff/line-changes.ts";
import { RepositorySession, type ScmResult } from "../scm/index.ts";
import { logDebug, logError, setVerbose } from "../ui/logger.ts";
import {
	formatBlame,
	formatChange,
	formatCommit,
	formatCommitInfo,
	formatLineChanges,
	formatStats,
	statusColor,
} from "./output.ts";

export const VERSION = "0.1.0";

interface CwdOptions {
	cwd: string;
}

export interface ProgramDeps {
	/** Opens the session for a directory */
	openSession?: (directory: string) => Promise<ScmResult<RepositorySession>>;
	/** Writes one line of command output */
	write?: (line: string) => void;
}

/**
 * Create the scmkit program
 */
export function createProgram(deps: ProgramDeps = {}): Command {
	const openSession = deps.openSession ?? ((directory: string) => RepositorySession.open(directory, { watch: false }));
	const write = deps.write ?? ((line: string) => console.log(line));

	const inSession = async (cwd: string, run: (session: RepositorySession) => Promise<void>): Promise<void> => {
		const opened = await openSession(cwd);
		if (!opened.ok) {
			logError(opened.error.message);
			process.exitCode = 1;
			return;
		}
		const session = opened.value;
		logDebug(`Using ${session.backend.name} at ${session.directory}`);
		try {
			await run(session);
		} finally {
			await session.dispose();
		}
	};

	const program = new Command();
	program
		.name("scmkit")
		.description("Query git and fossil working trees")
		.version(VERSION)
		.option("-v, --verbose", "Print debug output")
		.hook("preAction", (thisCommand) => {
			setVerbose(Boolean(thisCommand.opts().verbose));
		});

	const repoCommand = (name: string, description: string): Command =>
		program.command(name).description(description).option("-C, --cwd <dir>", "Project directory", process.cwd());

	repoCommand("detect", "Print the backend that claims the directory").action(async (options: CwdOptions) => {
		await inSession(options.cwd, async (session) => {
			write(`${session.backend.name} ${session.directory}`);
		});
	});

	repoCommand("branch", "Print the current branch").action(async (options: CwdOptions) => {
		await inSession(options.cwd, async (session) => {
			const branch = await session.backend.getBranch(session.directory);
			write(branch ?? "(no branch)");
		});
	});

	repoCommand("changes", "List changed files").action(async (options: CwdOptions) => {
		await inSession(options.cwd, async (session) => {
			const { value: changes } = await session.backend.getChanges(session.directory);
			for (const change of changes) {
				write(statusColor(change.status)(formatChange(change, session.directory)));
			}
		});
	});

	repoCommand("log", "Print commit history, newest first")
		.argument("[path]", "Limit history to a path")
		.action(async (path: string | undefined, options: CwdOptions) => {
			await inSession(options.cwd, async (session) => {
				const commits = await session.backend.getCommitHistory(session.directory, path);
				for (const commit of commits) {
					write(formatCommit(commit));
				}
			});
		});

	repoCommand("show", "Print a commit's metadata")
		.argument("<id>", "Commit id")
		.action(async (id: string, options: CwdOptions) => {
			await inSession(options.cwd, async (session) => {
				const commit = await session.backend.getCommitInfo(id, session.directory);
				for (const line of formatCommitInfo(commit)) {
					write(line);
				}
			});
		});

	repoCommand("blame", "Print the commit that last touched each line")
		.argument("<file>", "File to blame")
		.action(async (file: string, options: CwdOptions) => {
			await inSession(options.cwd, async (session) => {
				const entries = await session.backend.getFileBlame(file, session.directory);
				if (entries === null) {
					logError(`Could not blame ${file}`);
					process.exitCode = 1;
					return;
				}
				for (const line of formatBlame(entries)) {
					write(line);
				}
			});
		});

	repoCommand("lines", "Classify the changed lines of a file's working diff")
		.argument("<file>", "File to classify")
		.action(async (file: string, options: CwdOptions) => {
			await inSession(options.cwd, async (session) => {
				const diff = await session.backend.getFileDiff(file, session.directory);
				const changes = parseLineChanges(diff);
				for (const line of formatLineChanges(changes)) {
					write(line);
				}
			});
		});

	repoCommand("stats", "Print insert and delete totals of the working diff").action(async (options: CwdOptions) => {
		await inSession(options.cwd, async (session) => {
			write(formatStats(await session.backend.getStats(session.directory)));
		});
	});

	repoCommand("status", "Print the tool's own status report").action(async (options: CwdOptions) => {
		await inSession(options.cwd, async (session) => {
			const status = await session.backend.getStatus(session.directory);
			write(status.trimEnd());
		});
	});

	return program;
}
