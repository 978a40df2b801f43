import type { Lookup } from "../ports/lookup"
import type { CredentialSupplier, ResolutionContext } from "../ports/resolution-context"
import type { SecretPayload, SecretsClient, VaultCredentials } from "../ports/secrets-client"
import { readEnvOverride } from "./env-override"
import {
  MissingError,
  SecretCredentialsMissingError,
  SecretKeyMissingError,
  SecretsDisabledError,
} from "./errors"
import { isPlainObject } from "./plain-object"
import { overrideVariableName, stripSlashes } from "./secret-path"

export type SecretCast = (value: unknown) => unknown

export type SecretVariableOptions = {
  /** Applied to the resolved value; never to the default. */
  cast?: SecretCast

  /** Returned when the key path is absent, unless defaults are disabled. */
  default?: unknown
}

/**
 * Points a configuration option at a secret: a path in the backend plus an
 * optional key path into its payload.
 *
 * Instances are immutable; `key()` returns a new variable, so a partially
 * built variable can be shared safely.
 *
 * @example
 * ```ts
 * const DATABASE_PASSWORD = vault("team/db").key("credentials").key("password")
 * ```
 */
export class SecretVariable {
  readonly path: string
  readonly keyPath: readonly string[]

  constructor(
    path: string,
    private readonly opts: SecretVariableOptions = {},
    keyPath: readonly string[] = [],
  ) {
    if (stripSlashes(path) === "") {
      throw new RangeError("Secret path must not be empty")
    }

    this.path = path
    this.keyPath = Object.freeze([...keyPath])
  }

  key(name: string): SecretVariable {
    return new SecretVariable(this.path, this.opts, [...this.keyPath, name])
  }

  get overrideVariableName(): string {
    return overrideVariableName(this.path)
  }

  get hasDefault(): boolean {
    return Object.hasOwn(this.opts, "default")
  }

  /**
   * A ready-to-export override for this variable, with `"example"` at the
   * key path.
   */
  overrideExample(): Record<string, string> {
    let value: unknown = "example"
    for (const key of [...this.keyPath].reverse()) value = { [key]: value }

    return {
      [this.overrideVariableName]: JSON.stringify(this.keyPath.length > 0 ? value : {}),
    }
  }

  async evaluate(
    client: SecretsClient,
    credentials: CredentialSupplier,
    context: ResolutionContext,
  ): Promise<unknown> {
    if (client.tryEnvFirst) {
      const override = readEnvOverride(context.env, this.overrideVariableName)
      if (override.kind === "found") return this.extract(override.value, context)
    }

    if (context.secretsDisabled) {
      throw new SecretsDisabledError(context.secretsDisabledVariable, this.path)
    }

    const payload = await client.load(this.path, await this.resolveCredentials(credentials))

    return this.extract(payload, context)
  }

  private async resolveCredentials(supply: CredentialSupplier): Promise<VaultCredentials> {
    let found: Partial<VaultCredentials>
    try {
      found = await supply()
    } catch (error) {
      if (error instanceof MissingError) throw new SecretCredentialsMissingError(this.path, error)
      throw error
    }

    const { address, token, username, password } = found
    if (!address) throw new SecretCredentialsMissingError(this.path)

    // kept next to a token for the re-login on 403
    const userPass = username && password ? { username, password } : null
    if (!token && !userPass) throw new SecretCredentialsMissingError(this.path)

    return { address, ...(token ? { token } : {}), ...userPass }
  }

  private extract(payload: SecretPayload, context: ResolutionContext): unknown {
    const found = this.walk(payload)

    if (found.kind === "found") {
      return this.opts.cast ? this.opts.cast(found.value) : found.value
    }

    if (this.hasDefault && !context.defaultsDisabled) return this.opts.default

    throw new SecretKeyMissingError(this.path, this.keyPath)
  }

  private walk(payload: SecretPayload): Lookup<unknown> {
    let current: unknown = payload

    for (const key of this.keyPath) {
      if (!isPlainObject(current) || !Object.hasOwn(current, key)) return { kind: "missing" }
      current = current[key]
    }

    return { kind: "found", value: current }
  }
}

export function vault(path: string, opts: SecretVariableOptions = {}): SecretVariable {
  return new SecretVariable(path, opts)
}

function toBuffer(value: unknown): Buffer {
  return Buffer.from(typeof value === "string" ? value : JSON.stringify(value), "utf8")
}

/**
 * Like {@link vault}, but resolves to a `Buffer` for APIs that expect file
 * contents (certificates, key files).
 */
export function vaultFile(path: string, opts: Pick<SecretVariableOptions, "default"> = {}) {
  return new SecretVariable(path, { ...opts, cast: toBuffer })
}
