#!/usr/bin/env tsx
import { logError } from "../ui/logger.ts";
import { createProgram } from "./program.ts";

createProgram()
	.parseAsync(process.argv)
	.catch((error: unknown) => {
		logError(error instanceof Error ? error.message : String(error));
		process.exitCode = 1;
	});
