export { bus } from "./bus.ts";
export type { EventName, EventPayload, ScmEvents } from "./types.ts";
