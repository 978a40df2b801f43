import type { AppError, ErrorCode, ErrorContext, SerializedError } from "../ports/error"

export type BaseErrorOptions<C extends ErrorCode = ErrorCode> = Readonly<{
  code: C
  context?: ErrorContext
  cause?: unknown
  isRetryable?: boolean
  isOperational?: boolean
}>

export class BaseError<C extends ErrorCode = ErrorCode>
  extends Error
  implements AppError
{
  readonly code: C
  readonly context: ErrorContext
  readonly isRetryable: boolean
  readonly isOperational: boolean
  readonly timestamp: Date

  constructor(message: string, options: BaseErrorOptions<C>) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause })

    this.name = new.target.name
    this.code = options.code
    this.context = Object.freeze({ ...options.context })
    this.isRetryable = options.isRetryable ?? false
    this.isOperational = options.isOperational ?? true
    this.timestamp = new Date()

    Error.captureStackTrace?.(this, new.target)
  }

  toJSON(): SerializedError {
    return serializeError(this)
  }
}

export type SerializeOptions = Readonly<{
  /** Include stack traces. Default: false */
  includeStack?: boolean

  /** Stop following `cause` after this many links. Default: 10 */
  maxCauseDepth?: number
}>

/**
 * Serialize any thrown value to a consistent shape.
 *
 * `BaseError` keeps its code and context; other `Error`s get code
 * `unknown`; non-errors are wrapped with the value in `context`.
 */
export function serializeError(err: unknown, options?: SerializeOptions): SerializedError {
  return serializeAt(err, options ?? {}, 0)
}

function serializeAt(err: unknown, options: SerializeOptions, depth: number): SerializedError {
  const includeStack = options.includeStack ?? false
  const maxDepth = options.maxCauseDepth ?? 10
  const cause = err instanceof Error ? err.cause : undefined
  const withCause = cause !== undefined && depth < maxDepth

  if (err instanceof BaseError) {
    return {
      name: err.name,
      code: err.code,
      message: err.message,
      context: { ...err.context },
      timestamp: err.timestamp.toISOString(),
      isRetryable: err.isRetryable,
      isOperational: err.isOperational,
      ...(withCause && { cause: serializeAt(cause, options, depth + 1) }),
      ...(includeStack && err.stack !== undefined && { stack: err.stack }),
    }
  }

  if (err instanceof Error) {
    return {
      name: err.name,
      code: "unknown",
      message: err.message,
      context: {},
      timestamp: new Date().toISOString(),
      isRetryable: false,
      isOperational: false,
      ...(withCause && { cause: serializeAt(cause, options, depth + 1) }),
      ...(includeStack && err.stack !== undefined && { stack: err.stack }),
    }
  }

  return {
    name: "NonErrorThrown",
    code: "unknown",
    message: typeof err === "string" ? err : "Unknown error",
    context: { value: err },
    timestamp: new Date().toISOString(),
    isRetryable: false,
    isOperational: false,
  }
}
