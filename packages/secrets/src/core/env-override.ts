import type { Lookup } from "../ports/lookup"
import type { EnvRecord } from "../ports/resolution-context"
import type { SecretPayload } from "../ports/secrets-client"
import { InvalidSecretOverrideError } from "./errors"
import { isPlainObject } from "./plain-object"

/**
 * Reads a JSON object from `env[variable]`. An unset variable is a miss;
 * anything set must decode to an object.
 */
export function readEnvOverride(env: EnvRecord, variable: string): Lookup<SecretPayload> {
  const raw = env[variable]
  if (raw === undefined) return { kind: "missing" }

  let decoded: unknown
  try {
    decoded = JSON.parse(raw)
  } catch (error) {
    throw new InvalidSecretOverrideError(variable, raw, error)
  }

  if (!isPlainObject(decoded)) throw new InvalidSecretOverrideError(variable, raw)

  return { kind: "found", value: decoded }
}
