import type { Milliseconds, TimeSource, UnixMs } from "@strata/clock"
import { CacheMissError } from "../../core/cache-miss-error"
import { ttlToMilliseconds } from "../../core/ttl"
import type { CacheKey } from "../../ports/cache-key"
import type { CacheTtl } from "../../ports/cache-options"
import type { CacheResult } from "../../ports/cache-result"
import type { TtlCache } from "../../ports/ttl-cache"

export type MemoryTtlCacheDeps = {
  clock: TimeSource
}

export type MemoryTtlCacheOptions = {
  /** `null` keeps entries forever. */
  ttl: CacheTtl | null
}

type MemoryTtlCacheEntry<T> = {
  value: T

  /** `null` when the cache has no TTL. */
  insertedAtMs: UnixMs | null
}

export class MemoryTtlCache<T> implements TtlCache<T> {
  private readonly entries = new Map<CacheKey, MemoryTtlCacheEntry<T>>()
  private readonly ttlMs: Milliseconds | null

  constructor(
    private readonly deps: MemoryTtlCacheDeps,
    opts: MemoryTtlCacheOptions = { ttl: null },
  ) {
    this.ttlMs = opts.ttl === null ? null : ttlToMilliseconds(opts.ttl)
  }

  get(key: CacheKey): CacheResult<T> {
    const entry = this.liveEntry(key)

    return entry ? { kind: "hit", value: entry.value } : { kind: "miss" }
  }

  getOrThrow(key: CacheKey): T {
    const entry = this.liveEntry(key)
    if (!entry) throw new CacheMissError(key)

    return entry.value
  }

  has(key: CacheKey): boolean {
    return this.liveEntry(key) !== undefined
  }

  set(key: CacheKey, value: T): void {
    this.entries.set(key, {
      value,
      insertedAtMs: this.ttlMs === null ? null : this.deps.clock.nowMs(),
    })
  }

  delete(key: CacheKey): boolean {
    return this.entries.delete(key)
  }

  clear(): void {
    this.entries.clear()
  }

  get size(): number {
    return this.entries.size
  }

  private liveEntry(key: CacheKey): MemoryTtlCacheEntry<T> | undefined {
    const entry = this.entries.get(key)
    if (entry === undefined) return undefined

    if (this.isExpired(entry)) {
      // may already be gone; Map#delete is a no-op then
      this.entries.delete(key)
      return undefined
    }

    return entry
  }

  private isExpired(entry: MemoryTtlCacheEntry<T>): boolean {
    if (this.ttlMs === null || entry.insertedAtMs === null) return false

    return entry.insertedAtMs + this.ttlMs <= this.deps.clock.nowMs()
  }
}
