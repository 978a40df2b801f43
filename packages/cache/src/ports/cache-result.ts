export type CacheHit<T> = {
  kind: "hit"
  value: T
}

/** The "empty" answer; distinct from a stored `undefined` or `null`. */
export type CacheMiss = {
  kind: "miss"
}

export type CacheResult<T> = CacheHit<T> | CacheMiss
