import { z } from "zod"
import type { EnvRecord, ResolutionContext } from "../ports/resolution-context"
import { InvalidFlagError } from "./errors"

export const DEFAULT_SECRETS_DISABLED_VARIABLE = "STRATA_DISABLE_SECRETS"
export const DEFAULT_DEFAULTS_DISABLED_VARIABLE = "VAULT_DISABLE_DEFAULTS"

const flagSchema = z.stringbool({
  truthy: ["1", "yes", "true", "on"],
  falsy: ["0", "no", "false", "off"],
})

/** Unset or blank is `false`; unknown spellings throw `InvalidFlagError`. */
export function readFlag(env: EnvRecord, variable: string): boolean {
  const raw = env[variable]
  if (raw === undefined || raw.trim() === "") return false

  const parsed = flagSchema.safeParse(raw.trim())
  if (!parsed.success) throw new InvalidFlagError(variable, raw)

  return parsed.data
}

export type CreateResolutionContextOptions = {
  env: EnvRecord
  secretsDisabledVariable?: string
  defaultsDisabledVariable?: string
}

export function createResolutionContext(opts: CreateResolutionContextOptions): ResolutionContext {
  const secretsDisabledVariable = opts.secretsDisabledVariable ?? DEFAULT_SECRETS_DISABLED_VARIABLE
  const defaultsDisabledVariable =
    opts.defaultsDisabledVariable ?? DEFAULT_DEFAULTS_DISABLED_VARIABLE

  return {
    env: opts.env,
    secretsDisabled: readFlag(opts.env, secretsDisabledVariable),
    defaultsDisabled: readFlag(opts.env, defaultsDisabledVariable),
    secretsDisabledVariable,
  }
}
