/**
 * A source of declared configuration options.
 *
 * A SettingsSource only *loads* raw option values: plain values, nested
 * objects and descriptors (`env()`, `vault()`, `lazy()`). Evaluation
 * happens in the facade.
 *
 * Sources are consulted newest first; later sources override earlier ones.
 */
export interface SettingsSource {
  /**
   * Human-readable name for errors and logs.
   * Example: "object", "json:settings.json", "module:./settings.cjs"
   */
  readonly name: string

  /**
   * Load option values. Called at most once per facade.
   *
   * - Upper-case keys are declared options
   * - Other keys are reachable through `get()` but not exported
   */
  load(): Readonly<Record<string, unknown>>
}
