import type { VaultCredentials } from "./secrets-client"

export type EnvRecord = Readonly<Record<string, string | undefined>>

/**
 * Per-facade switches threaded through every secret evaluation instead of
 * being re-read from the process environment.
 */
export type ResolutionContext = {
  /** Where override variables are looked up. */
  env: EnvRecord

  /** Refuse to contact the backend. Env overrides still apply. */
  secretsDisabled: boolean

  /** Treat configured defaults as absent. */
  defaultsDisabled: boolean

  /** Variable named in the error raised while secrets are disabled. */
  secretsDisabledVariable: string
}

/**
 * Supplies backend credentials, typically read from configuration options
 * so tests can override them. Fields it cannot resolve are left out; a
 * missing-kind error means the lookup itself failed.
 */
export type CredentialSupplier = () =>
  | Partial<VaultCredentials>
  | Promise<Partial<VaultCredentials>>
