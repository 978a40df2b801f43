export {
  type MemoryLoadCall,
  MemorySecretsClient,
  type MemorySecretsClientOptions,
} from "./adapters/memory/memory-secrets-client"
export {
  VaultSecretsClient,
  type VaultSecretsClientDeps,
  type VaultSecretsClientOptions,
} from "./adapters/vault/vault-secrets-client"
export { readEnvOverride } from "./core/env-override"
export {
  InvalidFlagError,
  InvalidSecretOverrideError,
  MissingError,
  type MissingErrorCode,
  SecretCredentialsMissingError,
  SecretKeyMissingError,
  SecretMissingError,
  SecretsDisabledError,
  VaultConnectionError,
  VaultRequestError,
} from "./core/errors"
export { isPlainObject } from "./core/plain-object"
export {
  type CreateResolutionContextOptions,
  createResolutionContext,
  DEFAULT_DEFAULTS_DISABLED_VARIABLE,
  DEFAULT_SECRETS_DISABLED_VARIABLE,
  readFlag,
} from "./core/resolution-context"
export { joinSecretPath, overrideVariableName, stripSlashes } from "./core/secret-path"
export {
  type SecretCast,
  SecretVariable,
  type SecretVariableOptions,
  vault,
  vaultFile,
} from "./core/secret-variable"
export type { Found, Lookup, NotFound } from "./ports/lookup"
export type {
  CredentialSupplier,
  EnvRecord,
  ResolutionContext,
} from "./ports/resolution-context"
export type { SecretPayload, SecretsClient, VaultCredentials } from "./ports/secrets-client"
