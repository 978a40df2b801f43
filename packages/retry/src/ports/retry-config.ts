import type { Milliseconds } from "@strata/clock"
import type { DelayPolicy } from "./delay-policy"
import type { RetryObserver } from "./observer"
import type { ErrorPredicate } from "./predicates"

/**
 * @remarks
 * `maxAttempts` counts tries, not retries: `maxAttempts: 3` means one
 * call plus up to two retries. Whichever of `maxAttempts` and
 * `maxElapsedMs` runs out first stops the loop.
 */
export interface RetryConfig {
  /** Integer >= 1 */
  maxAttempts: number

  delay: DelayPolicy

  /** Retry every error when omitted. */
  errorPredicate?: ErrorPredicate

  observer?: RetryObserver

  /**
   * Wall-clock budget measured from the first attempt. No attempt starts
   * after it is spent and waits are shortened to fit inside it.
   */
  maxElapsedMs?: Milliseconds
}
