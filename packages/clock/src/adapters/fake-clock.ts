import type { Clock } from "../ports/clock"
import type { Milliseconds, UnixMs } from "../ports/time"

export type FakeClockOptions = {
  /**
   * Move time forward by the requested duration on every `sleep()`.
   * Lets retry deadlines elapse without real timers.
   */
  advanceOnSleep?: boolean
}

export class FakeClock implements Clock {
  private time: UnixMs
  private readonly requestedSleeps: Milliseconds[] = []

  constructor(
    start: UnixMs = 0,
    private readonly opts: FakeClockOptions = {},
  ) {
    this.time = start
  }

  now(): Date {
    return new Date(this.time)
  }

  nowMs(): UnixMs {
    return this.time
  }

  advance(ms: Milliseconds): void {
    this.time = this.time + ms
  }

  set(ms: UnixMs): void {
    this.time = ms
  }

  /** Durations passed to `sleep()`, oldest first. */
  get sleeps(): readonly Milliseconds[] {
    return [...this.requestedSleeps]
  }

  /** Resolves immediately; never schedules a timer. */
  async sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) return

    this.requestedSleeps.push(ms)

    if (this.opts.advanceOnSleep && ms > 0) this.advance(ms)
  }
}
