/**
 * Well-known structured fields. Every field is optional at the call site
 * (see {@link LogMeta}); `child()` binds a subset for a whole component.
 */
export type LogContext = {
  service: string
  module: string
  env: string

  /** Configuration option name, e.g. `DATABASE_URL`. */
  option: string

  /** Settings source name, e.g. `json:settings.json`. */
  source: string

  /** Secret path as requested, before the client prefix is applied. */
  path: string
  prefix: string

  /** Override layer id. */
  layer: string

  attempt: number
  delayMs: number
  durationMs: number
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent>
