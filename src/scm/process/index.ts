export { Checkpoint, throwIfAborted, yieldControl } from "./cooperative.ts";
export { EXIT_SPAWN_FAILED, EXIT_TIMED_OUT, ProcessHandle, type OutputStream } from "./handle.ts";
export {
	DEFAULT_COMMAND_ENV,
	DEFAULT_COMMAND_TIMEOUT,
	DEFAULT_KILL_GRACE,
	runCommand,
	type CommandOutput,
	type CommandRunner,
	type RunCommandOptions,
} from "./runner.ts";
