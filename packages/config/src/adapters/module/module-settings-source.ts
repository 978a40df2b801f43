import { createRequire } from "node:module"
import path from "node:path"
import { type EnvRecord, isPlainObject } from "@strata/secrets"
import { SettingsNotLoadableError, SettingsNotSpecifiedError } from "../../core/errors"
import type { SettingsSource } from "../../ports/settings-source"
import { hasErrorCode } from "../errno"

export const DEFAULT_SETTINGS_VARIABLE = "STRATA_SETTINGS"

export type ModuleSettingsSourceOptions = {
  /** Environment variable holding the module path. Default: `STRATA_SETTINGS` */
  variable?: string

  /** Default: `process.env` */
  env?: EnvRecord

  /** Base directory for relative module paths. Default: `process.cwd()` */
  cwd?: string
}

const requireModule = createRequire(import.meta.url)

/**
 * Loads a CommonJS module (`.js`, `.cjs`) or a `.json` file named by an
 * environment variable. The module's exports, or its `default` export, are
 * the settings, so it may declare `env()`, `vault()` and `lazy()` options.
 */
export class ModuleSettingsSource implements SettingsSource {
  readonly name: string
  private readonly variable: string

  constructor(private readonly opts: ModuleSettingsSourceOptions = {}) {
    this.variable = opts.variable ?? DEFAULT_SETTINGS_VARIABLE
    this.name = `module:$${this.variable}`
  }

  load(): Readonly<Record<string, unknown>> {
    const file = (this.opts.env ?? process.env)[this.variable]?.trim()
    if (!file) throw new SettingsNotSpecifiedError(this.variable)

    let exported: unknown
    try {
      exported = requireModule(path.resolve(this.opts.cwd ?? process.cwd(), file))
    } catch (error) {
      if (hasErrorCode(error, "MODULE_NOT_FOUND")) throw new SettingsNotLoadableError(file, error)
      throw error
    }

    if (isPlainObject(exported) && isPlainObject(exported["default"])) {
      return { ...exported["default"] }
    }
    if (isPlainObject(exported)) return { ...exported }

    throw new SettingsNotLoadableError(file)
  }
}
