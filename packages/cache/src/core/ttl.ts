import type { Milliseconds } from "@strata/clock"
import type { CacheTtl } from "../ports/cache-options"

export const MAX_TTL_SECONDS = 999_999_999

/** Validates `ttl` against `(0, MAX_TTL_SECONDS]` and converts it. */
export function ttlToMilliseconds(ttl: CacheTtl): Milliseconds {
  const ms = ttl.kind === "seconds" ? ttl.seconds * 1000 : ttl.milliseconds

  if (!Number.isFinite(ms) || ms <= 0 || ms > MAX_TTL_SECONDS * 1000) {
    throw new RangeError(
      `Cache TTL must be greater than 0 and at most ${MAX_TTL_SECONDS} seconds (got ${ms}ms)`,
    )
  }

  return ms
}
