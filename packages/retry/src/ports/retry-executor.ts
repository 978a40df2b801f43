import type { RetryConfig } from "./retry-config"
import type { RetryFn } from "./retry-fn"

/**
 * Runs a function until it resolves, the predicate rejects the error, or
 * the attempt or time budget is spent. The last error is rethrown as is.
 */
export interface IRetryExecutor {
  execute<T>(fn: RetryFn<T>, config: RetryConfig): Promise<T>
}
