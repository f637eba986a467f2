export { DerivedData } from "./derived-data.js";
export type { SuccessEntry, FailedEntry, CacheEntry, Continuation } from "./types.js";
export { PendingQueue } from "./pending-queue.js";
export { type ArtifactCacheOptions, type WithCachedOptions, ArtifactCache } from "./artifact-cache.js";
export { DerivedDataCache } from "./derived-cache.js";
