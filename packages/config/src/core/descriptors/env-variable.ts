import type { EnvRecord } from "@strata/secrets"
import { MissingOptionError } from "../errors"
import { type DefaultOptions, defaultValue, hasDefault } from "./default-value"

export type EnvVariableOptions = DefaultOptions & {
  /** Applied to the raw string; never to the default. */
  cast?: (value: string) => unknown
}

/** Option read from an environment variable when accessed. */
export class EnvVariable {
  constructor(
    readonly name: string,
    private readonly opts: EnvVariableOptions = {},
  ) {
    if (name === "") {
      throw new RangeError("Environment variable name should not be an empty string")
    }
    if (name.includes("\0")) {
      throw new RangeError("Environment variable name contains null bytes")
    }
  }

  get hasDefault(): boolean {
    return hasDefault(this.opts)
  }

  evaluate(env: EnvRecord): unknown {
    const raw = env[this.name]

    if (raw === undefined) {
      if (!this.hasDefault) throw MissingOptionError.variableNotSet(this.name)
      return defaultValue(this.opts)
    }

    return this.opts.cast ? this.opts.cast(raw) : raw
  }
}

export function env(name: string, opts: EnvVariableOptions = {}): EnvVariable {
  return new EnvVariable(name, opts)
}
