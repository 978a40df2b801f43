import fs from "node:fs"
import path from "node:path"
import { parse } from "dotenv"
import { hasErrorCode } from "../errno"

/**
 * Options for reading a .env file.
 */
export type DotenvOptions = {
  /**
   * Path to the .env file, absolute or relative to `cwd`.
   *
   * @default ".env"
   */
  file?: string

  /**
   * Let values from the file replace variables that are already set.
   *
   * @default false
   */
  override?: boolean

  /**
   * Throw if the file does not exist.
   *
   * @default false
   */
  required?: boolean

  /**
   * @default process.cwd()
   */
  cwd?: string
}

export class DotenvFile {
  readonly name: string

  constructor(private readonly opts: DotenvOptions = {}) {
    this.name = `dotenv:${opts.file ?? ".env"}`
  }

  load(): Record<string, string> {
    const filePath = path.resolve(this.opts.cwd ?? process.cwd(), this.opts.file ?? ".env")

    try {
      return parse(fs.readFileSync(filePath, "utf-8"))
    } catch (err) {
      if (!this.opts.required && hasErrorCode(err, "ENOENT")) return {}
      throw err
    }
  }

  /** `env` merged with the file; `env` wins unless `override` is set. */
  applyTo(env: Readonly<Record<string, string | undefined>>): Record<string, string | undefined> {
    const values = this.load()
    if (this.opts.override) return { ...env, ...values }

    const present = Object.entries(env).filter(([, value]) => value !== undefined)

    return { ...values, ...Object.fromEntries(present) }
  }
}
