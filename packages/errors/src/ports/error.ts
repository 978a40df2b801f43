/** Lower snake case, e.g. `secret_missing`. */
export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to errors: the option name, secret path,
 * prefix and similar values that make a failure diagnosable.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode
  readonly context: ErrorContext

  /** `true` if repeating the same call might succeed. */
  readonly isRetryable: boolean

  /**
   * Expected runtime failure (`true`: missing option, unreachable backend)
   * versus programmer error (`false`: unknown override layer, broken invariant).
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date
  readonly cause?: unknown
}

/** JSON-safe error shape for logs. */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isRetryable: boolean
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
