import type { Milliseconds } from "@strata/clock"

export type Delay = { milliseconds: Milliseconds }

/**
 * Wait before the next attempt; `attempt` is the 0-indexed attempt that
 * just failed.
 */
export interface DelayPolicy {
  getDelay(attempt: number): Delay
}
