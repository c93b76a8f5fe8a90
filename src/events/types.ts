// Strongly typed event map for scmkit events
export type ScmEvents = {
	// Subprocess lifecycle
	"scm:command:start": { command: string; args: string[]; cwd: string };
	"scm:command:complete": {
		command: string;
		args: string[];
		cwd: string;
		exitCode: number;
		duration: number;
		timedOut: boolean;
	};

	// Result cache
	"scm:cache:store": { operation: string; key: string; expiry?: number };
	"scm:cache:invalidate": { operation?: string; key?: string; reason: string };

	// Change notifications
	"scm:watch:change": { root: string; path: string };

	// Detection
	"scm:backend:detected": { directory: string; backend: string };

	// Mutating operations
	"scm:path:mutated": { operation: string; paths: string[]; success: boolean };
};

export type EventName = keyof ScmEvents;
export type EventPayload<E extends EventName> = ScmEvents[E];
