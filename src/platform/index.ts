/**
 * @fileoverview Platform Module Barrel Export
 *
 * @module platform
 */

export * from "./executable-resolver.ts";
export * from "./path-probe.ts";
