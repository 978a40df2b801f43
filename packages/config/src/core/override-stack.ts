import { createNullLogger, type Logger } from "@strata/logger"
import type { Lookup } from "@strata/secrets"
import { ForbiddenOverrideError, OverrideLayerError } from "./errors"

export type OverrideValues = Readonly<Record<string, unknown>>

export type OverrideStackDeps = {
  /** Upper-case option names across every settings source. */
  declaredOptions: () => ReadonlySet<string>
  logger?: Logger
}

export type OverrideStackOptions = {
  /** Reject overrides of undeclared options. Default: true */
  strict?: boolean
}

/**
 * Ordered override layers. The newest layer that has a name wins.
 *
 * @remarks
 * Not synchronized: layers are expected to be pushed and removed from one
 * logical thread of control, e.g. a test runner's hooks.
 */
export class OverrideStack {
  private readonly layers = new Map<string, OverrideValues>()
  private readonly logger: Logger
  private readonly strict: boolean

  constructor(
    private readonly deps: OverrideStackDeps,
    opts: OverrideStackOptions = {},
  ) {
    this.logger = deps.logger ?? createNullLogger()
    this.strict = opts.strict ?? true
  }

  /** Active layer ids, oldest first. */
  get ids(): readonly string[] {
    return [...this.layers.keys()]
  }

  /** Validation happens before anything is pushed. */
  activate(id: string, values: OverrideValues): void {
    if (this.layers.has(id)) throw OverrideLayerError.alreadyActive(id)

    if (this.strict) {
      const declared = this.deps.declaredOptions()
      const forbidden = Object.keys(values).filter((key) => !declared.has(key))

      if (forbidden.length > 0) throw new ForbiddenOverrideError(forbidden)
    }

    this.layers.set(id, Object.freeze({ ...values }))
    this.logger.debug("Override enabled", { layer: id })
  }

  deactivate(id: string): void {
    if (!this.layers.delete(id)) throw OverrideLayerError.unknown(id)

    this.logger.debug("Override disabled", { layer: id })
  }

  deactivateAll(): void {
    this.layers.clear()
    this.logger.debug("All overrides disabled")
  }

  /** A key that is present counts, even when its value is `undefined`. */
  resolve(name: string): Lookup<unknown> {
    for (const values of [...this.layers.values()].reverse()) {
      if (Object.hasOwn(values, name)) return { kind: "found", value: values[name] }
    }

    return { kind: "missing" }
  }
}
