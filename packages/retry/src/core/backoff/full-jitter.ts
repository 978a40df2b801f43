import { systemRandom } from "../../adapters/random"
import type { Delay } from "../../ports/delay-policy"
import type { JitterStrategy } from "../../ports/jitter-strategy"
import type { RandomSource } from "../../ports/random-source"

/** Uniform integer in `[0, delay]`. */
export function fullJitter(random: RandomSource = systemRandom): JitterStrategy {
  return {
    apply(delay: Delay): Delay {
      return {
        milliseconds: Math.floor(random.next() * (delay.milliseconds + 1)),
      }
    },
  }
}
