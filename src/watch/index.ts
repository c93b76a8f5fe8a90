export { ChokidarFileWatcher, type ChokidarWatcherOptions } from "./chokidar-watcher.ts";
export type { FileWatcher, Unsubscribe } from "./types.ts";
