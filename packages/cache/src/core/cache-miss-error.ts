import { BaseError } from "@strata/errors"
import type { CacheKey } from "../ports/cache-key"

export class CacheMissError extends BaseError<"cache_miss"> {
  constructor(key: CacheKey) {
    super(`Key \`${key}\` is not cached`, { code: "cache_miss", context: { key } })
  }
}
