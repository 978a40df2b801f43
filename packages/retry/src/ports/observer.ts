import type { RetryAttemptInfo } from "./attempt-context"

/**
 * Lifecycle hooks, mostly for logging. A throwing hook is a programmer
 * error and propagates out of `execute()`.
 */
export interface RetryObserver {
  /** An attempt failed and another one will follow after `nextDelayMs`. */
  onRetry?(error: unknown, info: RetryAttemptInfo): void | Promise<void>

  /** The last error is about to be rethrown. */
  onExhausted?(error: unknown, info: RetryAttemptInfo): void | Promise<void>
}
