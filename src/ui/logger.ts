import pc from "picocolors";
import { loggers } from "../observability/index.ts";

let verboseMode = false;

/**
 * Set verbose mode
 */
export function setVerbose(verbose: boolean): void {
	verboseMode = verbose;
}

/**
 * Log error message
 */
export function logError(...args: unknown[]): void {
	console.error(pc.red("[ERROR]"), ...args);
	loggers.cli.error({ args }, args.join(" "));
}

/**
 * Log debug message (only in verbose mode)
 */
export function logDebug(...args: unknown[]): void {
	if (verboseMode) {
		console.error(pc.dim("[DEBUG]"), ...args);
	}
	loggers.cli.debug({ args }, args.join(" "));
}
