export { DotenvFile, type DotenvOptions } from "./adapters/dotenv/dotenv-file"
export {
  JsonSettingsSource,
  type JsonSettingsSourceOptions,
} from "./adapters/json/json-settings-source"
export {
  DEFAULT_SETTINGS_VARIABLE,
  ModuleSettingsSource,
  type ModuleSettingsSourceOptions,
} from "./adapters/module/module-settings-source"
export { ObjectSettingsSource } from "./adapters/object/object-settings-source"
export {
  Config,
  type ConfigDeps,
  type ConfigOptions,
  type CredentialOptionNames,
  DEFAULT_CREDENTIAL_OPTIONS,
  isOptionName,
} from "./core/config"
export {
  type CreateConfigOptions,
  createConfig,
  InvalidConfigOptionsError,
} from "./core/create-config"
export { casts } from "./core/descriptors/casts"
export type { DefaultOptions } from "./core/descriptors/default-value"
export { EnvVariable, type EnvVariableOptions, env } from "./core/descriptors/env-variable"
export {
  type LazyFn,
  LazyVariable,
  type LazyVariableOptions,
  lazy,
} from "./core/descriptors/lazy-variable"
export {
  ForbiddenOverrideError,
  InvalidCastError,
  MissingOptionError,
  OverrideLayerError,
  SettingsNotLoadableError,
  SettingsNotSpecifiedError,
  VaultBackendMissingError,
} from "./core/errors"
export { evaluateTree } from "./core/evaluate-tree"
export {
  OverrideScope,
  type SuiteClass,
  type SuiteHooks,
  type WrappedSuiteClass,
  type WrappedSuiteHooks,
} from "./core/override-scope"
export {
  OverrideStack,
  type OverrideStackDeps,
  type OverrideStackOptions,
  type OverrideValues,
} from "./core/override-stack"
export type { IConfig } from "./ports/config"
export type { SettingsSource } from "./ports/settings-source"
export { SecretVariable, vault, vaultFile } from "@strata/secrets"
