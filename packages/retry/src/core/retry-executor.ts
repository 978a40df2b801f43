import type { Clock, Milliseconds, UnixMs } from "@strata/clock"
import type { AttemptContext, RetryAttemptInfo } from "../ports/attempt-context"
import type { RetryConfig } from "../ports/retry-config"
import type { IRetryExecutor } from "../ports/retry-executor"
import type { RetryFn } from "../ports/retry-fn"

export type RetryExecutorDeps = {
  clock: Clock
}

export function createRetryExecutor(deps: RetryExecutorDeps): IRetryExecutor {
  return new RetryExecutor(deps)
}

class RetryExecutor implements IRetryExecutor {
  constructor(private readonly deps: RetryExecutorDeps) {}

  async execute<T>(fn: RetryFn<T>, config: RetryConfig): Promise<T> {
    this.validateConfig(config)

    const startedAt = this.deps.clock.nowMs()

    for (let attempt = 0; ; attempt++) {
      const ctx = this.buildContext(attempt, startedAt)

      try {
        return await fn(ctx)
      } catch (error) {
        const nextDelayMs = this.nextDelay(error, config, ctx)

        if (nextDelayMs === null) {
          await config.observer?.onExhausted?.(error, this.buildInfo(ctx, null))
          throw error
        }

        await config.observer?.onRetry?.(error, this.buildInfo(ctx, nextDelayMs))
        if (nextDelayMs > 0) await this.deps.clock.sleep(nextDelayMs)
      }
    }
  }

  /** `null` when this failure ends the loop. */
  private nextDelay(
    error: unknown,
    config: RetryConfig,
    ctx: AttemptContext,
  ): Milliseconds | null {
    if (ctx.attempt + 1 >= config.maxAttempts) return null
    if (!(config.errorPredicate?.shouldRetry(error, ctx) ?? true)) return null

    const delayMs = config.delay.getDelay(ctx.attempt).milliseconds
    if (config.maxElapsedMs === undefined) return delayMs

    const remaining = config.maxElapsedMs - (this.deps.clock.nowMs() - ctx.startedAt)
    if (remaining <= 0) return null

    return Math.min(delayMs, remaining)
  }

  private validateConfig(config: RetryConfig): void {
    if (!Number.isInteger(config.maxAttempts) || config.maxAttempts < 1) {
      throw new RangeError(
        `maxAttempts must be an integer >= 1 (got ${config.maxAttempts})`,
      )
    }

    const { maxElapsedMs } = config
    if (maxElapsedMs !== undefined && (!Number.isFinite(maxElapsedMs) || maxElapsedMs < 0)) {
      throw new RangeError(`maxElapsedMs must be a finite number >= 0 (got ${maxElapsedMs})`)
    }
  }

  private buildContext(attempt: number, startedAt: UnixMs): AttemptContext {
    return {
      attempt,
      startedAt,
      elapsedMs: this.deps.clock.nowMs() - startedAt,
    }
  }

  private buildInfo(ctx: AttemptContext, nextDelayMs: Milliseconds | null): RetryAttemptInfo {
    return {
      ...ctx,
      elapsedMs: this.deps.clock.nowMs() - ctx.startedAt,
      nextDelayMs,
    }
  }
}
