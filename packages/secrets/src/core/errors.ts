import { BaseError } from "@strata/errors"

export type MissingErrorCode =
  | "missing_option"
  | "secret_missing"
  | "secret_key_missing"
  | "secret_credentials_missing"

/**
 * Base for "value not available" failures. Lazy options fall back to
 * their default on these, and `require()` reports them.
 */
export class MissingError<C extends MissingErrorCode = MissingErrorCode> extends BaseError<C> {}

export class SecretMissingError extends MissingError<"secret_missing"> {
  constructor(path: string, prefix: string | undefined) {
    super(`Option \`${path}\` is not present in Vault (${prefix ?? "no prefix"})`, {
      code: "secret_missing",
      context: { path, prefix },
    })
  }
}

export class SecretKeyMissingError extends MissingError<"secret_key_missing"> {
  constructor(path: string, keyPath: readonly string[]) {
    super(
      `Path \`${path}\` exists in Vault but does not contain given key path - \`${keyPath.join(".")}\``,
      { code: "secret_key_missing", context: { path, keyPath } },
    )
  }
}

export class SecretCredentialsMissingError extends MissingError<"secret_credentials_missing"> {
  constructor(path: string, cause?: unknown) {
    super(`Can't access secret \`${path}\` due to failing to load Vault config`, {
      code: "secret_credentials_missing",
      context: { path },
      ...(cause !== undefined && { cause }),
    })
  }
}

export class InvalidSecretOverrideError extends BaseError<"invalid_secret_override"> {
  constructor(variable: string, raw: string, cause?: unknown) {
    super(`\`${variable}\` variable should be a JSON-encoded dictionary, got: \`${raw}\``, {
      code: "invalid_secret_override",
      context: { variable },
      ...(cause !== undefined && { cause }),
    })
  }
}

export class SecretsDisabledError extends BaseError<"secrets_disabled"> {
  constructor(variable: string, path: string) {
    super(
      `Access to vault is disabled. Unset \`${variable}\` environment variable to enable it.`,
      { code: "secrets_disabled", context: { variable, path } },
    )
  }
}

export class InvalidFlagError extends BaseError<"invalid_flag"> {
  constructor(variable: string, raw: string) {
    super(
      `\`${variable}\` should be a boolean flag (1/yes/true/on or 0/no/false/off), got: \`${raw}\``,
      { code: "invalid_flag", context: { variable } },
    )
  }
}

/** The backend could not be reached at all. The only retried failure. */
export class VaultConnectionError extends BaseError<"vault_unreachable"> {
  constructor(address: string, cause: unknown) {
    super(`Can't connect to Vault at ${address}`, {
      code: "vault_unreachable",
      context: { address },
      cause,
      isRetryable: true,
    })
  }
}

export class VaultRequestError extends BaseError<"vault_request_failed"> {
  constructor(
    operation: "read" | "login",
    readonly status: number,
    context: Readonly<Record<string, unknown>>,
    detail?: string,
    cause?: unknown,
  ) {
    super(`Vault ${operation} failed with status ${status}${detail ? `: ${detail}` : ""}`, {
      code: "vault_request_failed",
      context: { ...context, operation, status },
      ...(cause !== undefined && { cause }),
    })
  }
}
