/** Decoded `data` object of a secret. */
export type SecretPayload = Readonly<Record<string, unknown>>

export type VaultCredentials = {
  /** Base URL, e.g. `https://vault.internal:8200`. */
  address: string
  token?: string
  username?: string
  password?: string
}

/**
 * Reads secret payloads from a backend. Implementations own retry,
 * re-authentication and caching; callers never retry.
 */
export interface SecretsClient {
  /**
   * Whether secret variables consult their environment override variable
   * before calling `load`.
   */
  readonly tryEnvFirst: boolean

  /**
   * @throws SecretMissingError when the path holds no data.
   */
  load(path: string, credentials: VaultCredentials): Promise<SecretPayload>
}
