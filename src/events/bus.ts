/**
 * Process-wide bus for scmkit events
 *
 * Subprocess runs, cache traffic, watcher notifications and mutating
 * operations are published here. Subscribers get a disposer from `on`.
 *
 * @module events/bus
 */

import mitt from "mitt";
import type { EventName, EventPayload, ScmEvents } from "./types.ts";

type Handler<E extends EventName> = (payload: EventPayload<E>) => void;

const scmEvents = mitt<ScmEvents>();

export const bus = {
	emit<E extends EventName>(event: E, payload: EventPayload<E>): void {
		scmEvents.emit(event, payload);
	},

	/**
	 * Subscribe to one event; the returned function unsubscribes
	 */
	on<E extends EventName>(event: E, handler: Handler<E>): () => void {
		scmEvents.on(event, handler);
		return () => scmEvents.off(event, handler);
	},

	/**
	 * Drop every subscription
	 */
	clear(): void {
		scmEvents.all.clear();
	},
};
