export function stripSlashes(value: string): string {
  return value.replace(/^\/+|\/+$/g, "")
}

/** `prefix/path` with surrounding slashes removed from both parts. */
export function joinSecretPath(prefix: string | undefined, path: string): string {
  return prefix ? `${stripSlashes(prefix)}/${stripSlashes(path)}` : stripSlashes(path)
}

/**
 * Environment variable that overrides a secret: `/team/db/` becomes
 * `TEAM__DB`.
 */
export function overrideVariableName(path: string): string {
  return stripSlashes(path).replaceAll("/", "__").toUpperCase()
}
