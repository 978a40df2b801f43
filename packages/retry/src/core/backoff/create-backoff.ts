import type { Delay, DelayPolicy } from "../../ports/delay-policy"
import type { JitterStrategy } from "../../ports/jitter-strategy"

export type CreateBackoffOptions = {
  delay: DelayPolicy
  jitter?: JitterStrategy

  /** Finite, >= 0 */
  min: Delay

  /** Finite, >= min */
  max: Delay
}

function assertBound(name: string, ms: number): void {
  if (!Number.isFinite(ms) || ms < 0) {
    throw new RangeError(`${name}.milliseconds must be finite and >= 0 (got ${ms})`)
  }
}

/**
 * Wraps a delay policy with optional jitter and clamps the result to
 * `[min, max]`. Non-finite or negative intermediate values fall back to
 * `min`; output is always an integer.
 */
export function createBackoff(options: CreateBackoffOptions): DelayPolicy {
  const { delay, jitter } = options
  const minMs = options.min.milliseconds
  const maxMs = options.max.milliseconds

  assertBound("min", minMs)
  assertBound("max", maxMs)

  if (maxMs < minMs) {
    throw new RangeError(
      `max.milliseconds must be >= min.milliseconds (got ${maxMs} < ${minMs})`,
    )
  }

  return {
    getDelay(attempt: number): Delay {
      const raw = delay.getDelay(attempt)
      const jittered = jitter ? jitter.apply(raw).milliseconds : raw.milliseconds
      const sane = Number.isFinite(jittered) && jittered >= 0 ? jittered : minMs

      return { milliseconds: Math.floor(Math.max(minMs, Math.min(maxMs, sane))) }
    },
  }
}
