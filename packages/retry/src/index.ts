export { systemRandom } from "./adapters/random"
export { constant } from "./core/backoff/constant"
export { type CreateBackoffOptions, createBackoff } from "./core/backoff/create-backoff"
export { exponential } from "./core/backoff/exponential"
export { fullJitter } from "./core/backoff/full-jitter"
export { createRetryExecutor, type RetryExecutorDeps } from "./core/retry-executor"
export type { AttemptContext, RetryAttemptInfo } from "./ports/attempt-context"
export type { Delay, DelayPolicy } from "./ports/delay-policy"
export type { JitterStrategy } from "./ports/jitter-strategy"
export type { RetryObserver } from "./ports/observer"
export type { ErrorPredicate } from "./ports/predicates"
export type { RandomSource } from "./ports/random-source"
export type { RetryConfig } from "./ports/retry-config"
export type { IRetryExecutor } from "./ports/retry-executor"
export type { RetryFn } from "./ports/retry-fn"
