export type DefaultOptions = {
  /** A function is called on each use and its result returned. */
  default?: unknown
}

export function hasDefault(opts: DefaultOptions): boolean {
  return Object.hasOwn(opts, "default")
}

function isThunk(value: unknown): value is () => unknown {
  return typeof value === "function"
}

export function defaultValue(opts: DefaultOptions): unknown {
  return isThunk(opts.default) ? opts.default() : opts.default
}
