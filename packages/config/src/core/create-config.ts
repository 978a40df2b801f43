import { BaseError } from "@strata/errors"
import type { Logger } from "@strata/logger"
import type { EnvRecord, SecretsClient } from "@strata/secrets"
import { z } from "zod"
import type { DotenvOptions } from "../adapters/dotenv/dotenv-file"
import { ModuleSettingsSource } from "../adapters/module/module-settings-source"
import { ObjectSettingsSource } from "../adapters/object/object-settings-source"
import type { SettingsSource } from "../ports/settings-source"
import { Config, type CredentialOptionNames } from "./config"

export type CreateConfigOptions = {
  /** Later sources take precedence over earlier ones. */
  sources?: readonly SettingsSource[]

  /** Shorthand for a single `ObjectSettingsSource`. */
  settings?: Readonly<Record<string, unknown>>

  /**
   * Variable naming the settings module when neither `sources` nor
   * `settings` is given. Default: `STRATA_SETTINGS`
   */
  settingsVariable?: string

  secrets?: SecretsClient
  strictOverride?: boolean
  env?: EnvRecord
  dotenv?: DotenvOptions
  secretsDisabledVariable?: string
  defaultsDisabledVariable?: string
  credentialOptions?: Partial<CredentialOptionNames>

  deps?: {
    logger?: Logger
  }
}

export class InvalidConfigOptionsError extends BaseError<"invalid_config_options"> {
  constructor(detail: string) {
    super(`Invalid createConfig options:\n${detail}`, {
      code: "invalid_config_options",
      isOperational: false,
    })
  }
}

const hasMethods =
  (...methods: string[]) =>
  (value: unknown): boolean =>
    typeof value === "object" &&
    value !== null &&
    methods.every((m) => m in value && typeof Reflect.get(value, m) === "function")

const variableName = z.string().min(1)

const optionsSchema = z
  .strictObject({
    sources: z.array(z.custom<SettingsSource>(hasMethods("load"))).min(1).optional(),
    settings: z.record(z.string(), z.unknown()).optional(),
    settingsVariable: variableName.optional(),
    secrets: z.custom<SecretsClient>(hasMethods("load"), "Expected a SecretsClient").optional(),
    strictOverride: z.boolean().optional(),
    env: z.record(z.string(), z.string().optional()).optional(),
    dotenv: z
      .strictObject({
        file: z.string().min(1).optional(),
        override: z.boolean().optional(),
        required: z.boolean().optional(),
        cwd: z.string().min(1).optional(),
      })
      .optional(),
    secretsDisabledVariable: variableName.optional(),
    defaultsDisabledVariable: variableName.optional(),
    credentialOptions: z
      .strictObject({
        address: variableName.optional(),
        token: variableName.optional(),
        username: variableName.optional(),
        password: variableName.optional(),
      })
      .optional(),
    deps: z
      .strictObject({
        logger: z.custom<Logger>(hasMethods("info", "child"), "Expected a Logger").optional(),
      })
      .optional(),
  })
  .refine((opts) => opts.sources === undefined || opts.settings === undefined, {
    message: "Pass either `sources` or `settings`, not both",
  })

function settingsSources(options: CreateConfigOptions): readonly SettingsSource[] {
  if (options.sources) return options.sources
  if (options.settings) return [new ObjectSettingsSource(options.settings)]

  return [
    new ModuleSettingsSource({
      ...(options.env !== undefined && { env: options.env }),
      ...(options.settingsVariable !== undefined && { variable: options.settingsVariable }),
    }),
  ]
}

/**
 * Validates `options` and builds a {@link Config}. Settings are loaded on
 * first access, not here.
 *
 * @throws InvalidConfigOptionsError
 */
export function createConfig(options: CreateConfigOptions = {}): Config {
  const result = optionsSchema.safeParse(options)
  if (!result.success) throw new InvalidConfigOptionsError(z.prettifyError(result.error))

  const { deps = {}, secrets, strictOverride, env, dotenv, credentialOptions } = options

  return new Config(deps, {
    sources: settingsSources(options),
    ...(secrets !== undefined && { secrets }),
    ...(strictOverride !== undefined && { strictOverride }),
    ...(env !== undefined && { env }),
    ...(dotenv !== undefined && { dotenv }),
    ...(credentialOptions !== undefined && { credentialOptions }),
    ...(options.secretsDisabledVariable !== undefined && {
      secretsDisabledVariable: options.secretsDisabledVariable,
    }),
    ...(options.defaultsDisabledVariable !== undefined && {
      defaultsDisabledVariable: options.defaultsDisabledVariable,
    }),
  })
}
