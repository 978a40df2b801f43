import type { Milliseconds, UnixMs } from "@strata/clock"

export interface AttemptContext {
  /** 0-indexed */
  attempt: number

  startedAt: UnixMs

  /** Time since the first attempt started. */
  elapsedMs: Milliseconds
}

export interface RetryAttemptInfo extends AttemptContext {
  /** Wait before the next attempt; `null` when no attempt follows. */
  nextDelayMs: Milliseconds | null
}
