import type { CacheKey } from "./cache-key"
import type { CacheResult } from "./cache-result"

/**
 * Key-value cache with one optional TTL shared by every entry.
 *
 * @remarks
 * Without a TTL entries live until overwritten, deleted or cleared. With a
 * TTL every read (`get`, `has`, `getOrThrow`) checks expiry first and drops
 * the stale entry, so callers never observe an expired value. There is no
 * capacity bound.
 */
export interface TtlCache<T> {
  get(key: CacheKey): CacheResult<T>

  /** Like `get`, but throws `CacheMissError` instead of returning a miss. */
  getOrThrow(key: CacheKey): T

  has(key: CacheKey): boolean

  /** Stores `value` and restarts its TTL. */
  set(key: CacheKey, value: T): void

  /** `false` when nothing was stored under `key`. Never throws. */
  delete(key: CacheKey): boolean

  clear(): void

  /** Stored entries, including expired ones not read since expiry. */
  readonly size: number
}
