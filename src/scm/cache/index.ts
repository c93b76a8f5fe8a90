export { type CacheEntry, type CacheLookup, ResultCache } from "./result-cache.ts";
