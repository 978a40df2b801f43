import { MissingError } from "@strata/secrets"
import type { IConfig } from "../../ports/config"
import { isPromiseLike } from "../evaluate-tree"
import { type DefaultOptions, defaultValue, hasDefault } from "./default-value"

export type LazyFn = (config: IConfig) => unknown

export type LazyVariableOptions = DefaultOptions & {
  cast?: (value: unknown) => unknown
}

/**
 * Option computed from other options on each access.
 *
 * When `fn` fails with a missing-kind error (an option or secret it reads
 * is absent) the default is used, if one was given.
 */
export class LazyVariable {
  constructor(
    private readonly fn: LazyFn,
    private readonly opts: LazyVariableOptions = {},
  ) {}

  evaluate(config: IConfig): unknown {
    let result: unknown
    try {
      result = this.fn(config)
    } catch (error) {
      return this.recover(error)
    }

    if (isPromiseLike(result)) {
      return Promise.resolve(result).then(
        (value) => this.cast(value),
        (error: unknown) => this.recover(error),
      )
    }

    return this.cast(result)
  }

  private cast(value: unknown): unknown {
    return this.opts.cast ? this.opts.cast(value) : value
  }

  private recover(error: unknown): unknown {
    if (error instanceof MissingError && hasDefault(this.opts)) return defaultValue(this.opts)

    throw error
  }
}

/**
 * @example
 * ```ts
 * DATABASE_URL: lazy((config) => `postgres://${config.get("DATABASE_HOST")}/app`)
 * ```
 */
export function lazy(fn: LazyFn, opts: LazyVariableOptions = {}): LazyVariable {
  return new LazyVariable(fn, opts)
}
