// Value Cache Module

export { DEFAULT_CACHE_SIZE, ValueCache } from "./value-cache";
export type { CacheRetention, ValueCacheOptions, ValueCacheStats } from "./value-cache";
