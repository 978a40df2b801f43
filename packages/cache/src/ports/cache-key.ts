/**
 * Plain string key. The secrets client uses the fully prefixed secret path,
 * e.g. `team/path/to`.
 */
export type CacheKey = string
