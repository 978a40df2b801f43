import { BaseError } from "@strata/errors"
import { MissingError } from "@strata/secrets"

export class MissingOptionError extends MissingError<"missing_option"> {
  private constructor(message: string, context: Readonly<Record<string, unknown>>) {
    super(message, { code: "missing_option", context })
  }

  static notDeclared(option: string, sources: readonly string[]): MissingOptionError {
    return new MissingOptionError(
      `Option \`${option}\` is not present in \`${sources.join(", ")}\``,
      { option, sources },
    )
  }

  static variableNotSet(variable: string): MissingOptionError {
    return new MissingOptionError(
      `Variable \`${variable}\` is not found and has no \`default\` specified`,
      { variable },
    )
  }

  static required(options: readonly string[]): MissingOptionError {
    return new MissingOptionError(`Options \`[${options.join(", ")}]\` are required`, { options })
  }
}

export class VaultBackendMissingError extends BaseError<"vault_backend_missing"> {
  constructor(path: string) {
    super(
      "Vault backend is not configured. Please specify `secrets` option in your `createConfig` call",
      { code: "vault_backend_missing", context: { path } },
    )
  }
}

function forbiddenMessage(options: readonly string[]): string {
  const names = options.map((o) => `\`${o}\``).join(", ")

  return options.length === 1
    ? `Can't override ${names} config option, because it is not defined in the settings`
    : `Can't override ${names} config options, because they are not defined in the settings`
}

export class ForbiddenOverrideError extends BaseError<"forbidden_override"> {
  constructor(options: readonly string[]) {
    super(forbiddenMessage(options), { code: "forbidden_override", context: { options } })
  }
}

/** Misuse of layer ids; a bug in the caller rather than bad configuration. */
export class OverrideLayerError extends BaseError<
  "override_layer_unknown" | "override_layer_active"
> {
  static unknown(layer: string): OverrideLayerError {
    return new OverrideLayerError(`Override layer \`${layer}\` is not active`, {
      code: "override_layer_unknown",
      context: { layer },
      isOperational: false,
    })
  }

  static alreadyActive(layer: string): OverrideLayerError {
    return new OverrideLayerError(`Override layer \`${layer}\` is already active`, {
      code: "override_layer_active",
      context: { layer },
      isOperational: false,
    })
  }
}

export class SettingsNotSpecifiedError extends BaseError<"settings_not_specified"> {
  constructor(variable: string) {
    super(
      `The environment variable \`${variable}\` is not set or empty and as such configuration could not be loaded. Set this variable and make it point to a settings file`,
      { code: "settings_not_specified", context: { variable } },
    )
  }
}

export class SettingsNotLoadableError extends BaseError<"settings_not_loadable"> {
  constructor(file: string, cause?: unknown) {
    super(`Unable to load settings file \`${file}\``, {
      code: "settings_not_loadable",
      context: { file },
      ...(cause !== undefined && { cause }),
    })
  }
}

export class InvalidCastError extends BaseError<"invalid_cast"> {
  constructor(value: string, expected: string, cause?: unknown) {
    super(`Can't cast \`${value}\` to ${expected}`, {
      code: "invalid_cast",
      context: { expected },
      ...(cause !== undefined && { cause }),
    })
  }
}
