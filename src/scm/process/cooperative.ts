/**
 * Cooperative scheduling helpers
 *
 * Output-consumption loops call into these at a fixed cadence so a large
 * result never holds the event loop for its whole length.
 *
 * @module scm/process/cooperative
 */

import { ScmAbortError } from "../errors.ts";

/**
 * Resume on the next turn of the event loop, after pending I/O callbacks
 */
export function yieldControl(): Promise<void> {
	return new Promise((resolve) => setImmediate(resolve));
}

/**
 * Throw ScmAbortError when the signal has fired
 */
export function throwIfAborted(signal?: AbortSignal, context?: Record<string, unknown>): void {
	if (signal?.aborted) {
		throw new ScmAbortError("SCM operation aborted", context);
	}
}

/**
 * Yield point that fires every `every` ticks and checks for cancellation
 */
export class Checkpoint {
	private readonly every: number;
	private readonly signal?: AbortSignal;

	constructor(every: number, signal?: AbortSignal) {
		this.every = Math.max(1, every);
		this.signal = signal;
	}

	/**
	 * Yield when `index` lands on the cadence
	 */
	async tick(index: number): Promise<void> {
		if (index % this.every === 0) {
			await this.pass();
		}
	}

	/**
	 * Yield unconditionally
	 */
	async pass(): Promise<void> {
		throwIfAborted(this.signal);
		await yieldControl();
		throwIfAborted(this.signal);
	}
}
