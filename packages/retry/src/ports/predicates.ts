import type { AttemptContext } from "./attempt-context"

export interface ErrorPredicate {
  shouldRetry(error: unknown, ctx: AttemptContext): boolean
}
