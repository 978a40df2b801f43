import type { Delay, DelayPolicy } from "../../ports/delay-policy"

export function constant(delay: Delay): DelayPolicy {
  return {
    getDelay(_attempt: number): Delay {
      return { milliseconds: delay.milliseconds }
    },
  }
}
