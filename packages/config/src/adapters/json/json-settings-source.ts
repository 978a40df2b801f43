import fs from "node:fs"
import path from "node:path"
import { isPlainObject } from "@strata/secrets"
import { SettingsNotLoadableError } from "../../core/errors"
import type { SettingsSource } from "../../ports/settings-source"
import { hasErrorCode } from "../errno"

/**
 * Options for creating a JSON settings source.
 */
export type JsonSettingsSourceOptions = {
  /**
   * Path to the JSON file.
   *
   * Can be absolute or relative to `cwd`.
   *
   * @example "settings.json", "./config/app.json"
   */
  file: string

  /**
   * Whether the file must exist.
   *
   * - `true`: Throws if file not found.
   * - `false`: Returns no options if file not found.
   */
  required: boolean

  /**
   * Base directory for resolving relative paths.
   *
   * @default process.cwd()
   */
  cwd?: string
}

/** Plain values only; the file cannot declare `env()` or `vault()` descriptors. */
export class JsonSettingsSource implements SettingsSource {
  readonly name: string

  constructor(private readonly opts: JsonSettingsSourceOptions) {
    this.name = `json:${opts.file}`
  }

  load(): Readonly<Record<string, unknown>> {
    const filePath = path.resolve(this.opts.cwd ?? process.cwd(), this.opts.file)

    let content: string
    try {
      content = fs.readFileSync(filePath, "utf-8")
    } catch (err) {
      if (!this.opts.required && hasErrorCode(err, "ENOENT")) return {}
      throw err
    }

    let parsed: unknown
    try {
      parsed = JSON.parse(content)
    } catch (err) {
      throw new SettingsNotLoadableError(this.opts.file, err)
    }

    if (!isPlainObject(parsed)) throw new SettingsNotLoadableError(this.opts.file)

    return parsed
  }
}
