import { SecretMissingError } from "../../core/errors"
import { joinSecretPath } from "../../core/secret-path"
import type { SecretPayload, SecretsClient, VaultCredentials } from "../../ports/secrets-client"

export type MemorySecretsClientOptions = {
  prefix?: string

  /** Default: true */
  tryEnvFirst?: boolean
}

export type MemoryLoadCall = {
  path: string
  credentials: VaultCredentials
}

/**
 * In-memory secrets client for tests and local development. Records every
 * `load` call so tests can assert the backend was (or was not) consulted.
 */
export class MemorySecretsClient implements SecretsClient {
  readonly tryEnvFirst: boolean

  private readonly secrets = new Map<string, SecretPayload>()
  private readonly loadCalls: MemoryLoadCall[] = []

  constructor(
    secrets: Readonly<Record<string, SecretPayload>> = {},
    private readonly opts: MemorySecretsClientOptions = {},
  ) {
    this.tryEnvFirst = opts.tryEnvFirst ?? true

    for (const [path, payload] of Object.entries(secrets)) this.set(path, payload)
  }

  /** `path` is taken as given; the prefix is not applied. */
  set(path: string, payload: SecretPayload): void {
    this.secrets.set(joinSecretPath(undefined, path), payload)
  }

  get calls(): readonly MemoryLoadCall[] {
    return [...this.loadCalls]
  }

  async load(path: string, credentials: VaultCredentials): Promise<SecretPayload> {
    this.loadCalls.push({ path, credentials })

    const payload = this.secrets.get(joinSecretPath(this.opts.prefix, path))
    if (payload === undefined) throw new SecretMissingError(path, this.opts.prefix)

    return payload
  }
}
