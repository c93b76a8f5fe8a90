/**
 * Change-notification subscription consumed by repository sessions
 *
 * @module watch/types
 */

/**
 * Removes a subscription
 */
export type Unsubscribe = () => Promise<void>;

/**
 * Watches paths for external mutation
 */
export interface FileWatcher {
	/** Call `onChange` with the changed path whenever something under `path` changes */
	watch(path: string, onChange: (changedPath: string) => void): Unsubscribe;
	/** Stop every subscription */
	close(): Promise<void>;
}
