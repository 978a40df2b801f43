export {
  MemoryTtlCache,
  type MemoryTtlCacheDeps,
  type MemoryTtlCacheOptions,
} from "./adapters/memory/memory-ttl-cache"
export { CacheMissError } from "./core/cache-miss-error"
export { MAX_TTL_SECONDS, ttlToMilliseconds } from "./core/ttl"
export type { CacheKey } from "./ports/cache-key"
export type { CacheTtl } from "./ports/cache-options"
export type { CacheHit, CacheMiss, CacheResult } from "./ports/cache-result"
export type { TtlCache } from "./ports/ttl-cache"
