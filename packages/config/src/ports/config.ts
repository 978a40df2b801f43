import type { OverrideScope } from "../core/override-scope"
import type { OverrideValues } from "../core/override-stack"

/**
 * Read access to configuration options.
 *
 * Values are evaluated on every access. Options backed by secrets (or by
 * async `lazy()` functions) come back as Promises; `resolve()` awaits
 * whatever `get()` returns.
 *
 * @example
 * ```ts
 * const config = createConfig({
 *   settings: {
 *     DEBUG: env("DEBUG", { default: false, cast: casts.boolean }),
 *     DATABASE_PASSWORD: vault("team/db").key("password"),
 *     VAULT_ADDR: env("VAULT_ADDR"),
 *     VAULT_TOKEN: env("VAULT_TOKEN"),
 *   },
 *   secrets: new VaultSecretsClient({}, { prefix: "team" }),
 * })
 *
 * config.get("DEBUG")                    // false
 * await config.resolve("DATABASE_PASSWORD") // "..."
 * ```
 */
export interface IConfig {
  /** Throws `MissingOptionError` when no override or source has `name`. */
  get(name: string): unknown

  resolve(name: string): Promise<unknown>

  /** Never throws on a missing option. */
  has(name: string): boolean

  /** Upper-case option names across every settings source, sorted. */
  optionNames(): string[]

  getSecret(path: string): Promise<unknown>

  /** Rejects with one `MissingOptionError` listing every missing name. */
  require(...names: string[]): Promise<void>

  exportAll(): Promise<Record<string, unknown>>

  override(values: OverrideValues): OverrideScope
}
