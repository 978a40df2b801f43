import { createNullLogger, type Logger } from "@strata/logger"
import {
  createResolutionContext,
  type EnvRecord,
  isPlainObject,
  type Lookup,
  MissingError,
  type ResolutionContext,
  type SecretsClient,
  SecretVariable,
  type VaultCredentials,
} from "@strata/secrets"
import { DotenvFile, type DotenvOptions } from "../adapters/dotenv/dotenv-file"
import { JsonSettingsSource } from "../adapters/json/json-settings-source"
import { ObjectSettingsSource } from "../adapters/object/object-settings-source"
import type { IConfig } from "../ports/config"
import type { SettingsSource } from "../ports/settings-source"
import { EnvVariable } from "./descriptors/env-variable"
import { LazyVariable } from "./descriptors/lazy-variable"
import { MissingOptionError, VaultBackendMissingError } from "./errors"
import { evaluateTree } from "./evaluate-tree"
import { OverrideScope } from "./override-scope"
import { OverrideStack, type OverrideValues } from "./override-stack"

export type CredentialOptionNames = {
  address: string
  token: string
  username: string
  password: string
}

export const DEFAULT_CREDENTIAL_OPTIONS: CredentialOptionNames = {
  address: "VAULT_ADDR",
  token: "VAULT_TOKEN",
  username: "VAULT_USERNAME",
  password: "VAULT_PASSWORD",
}

export type ConfigDeps = {
  logger?: Logger
}

export type ConfigOptions = {
  /** Later sources take precedence over earlier ones. */
  sources: readonly SettingsSource[]

  /** Required to evaluate `vault()` options. */
  secrets?: SecretsClient

  /** Reject overrides of undeclared options. Default: true */
  strictOverride?: boolean

  /** Default: `process.env` */
  env?: EnvRecord

  /** Read a .env file before the first environment lookup. */
  dotenv?: DotenvOptions

  /** Default: `STRATA_DISABLE_SECRETS` */
  secretsDisabledVariable?: string

  /** Default: `VAULT_DISABLE_DEFAULTS` */
  defaultsDisabledVariable?: string

  /** Options the backend credentials are read from. */
  credentialOptions?: Partial<CredentialOptionNames>
}

type SourceSlot = {
  source: SettingsSource
  values: Readonly<Record<string, unknown>> | null
}

/** Upper-case in the sense of having cased letters and no lower-case ones. */
export function isOptionName(name: string): boolean {
  return name === name.toUpperCase() && name !== name.toLowerCase()
}

function toText(value: unknown): string | undefined {
  return value === undefined || value === null ? undefined : String(value)
}

/**
 * Configuration facade. Looks options up in the override stack first, then
 * in the settings sources (newest first), and evaluates what it finds:
 *
 * - `env()` reads the environment
 * - `vault()` goes through the secrets client and returns a Promise
 * - `lazy()` calls its function with this facade
 * - nested plain objects are rebuilt with their leaves evaluated
 * - anything else is returned as is
 *
 * Override values are returned as given, without evaluation.
 */
export class Config implements IConfig {
  private readonly slots: SourceSlot[]
  private readonly overrides: OverrideStack
  private readonly logger: Logger
  private readonly credentialOptions: CredentialOptionNames
  private env: EnvRecord | null = null
  private context: ResolutionContext | null = null
  private scopes = 0

  constructor(
    deps: ConfigDeps,
    private readonly opts: ConfigOptions,
  ) {
    this.logger = (deps.logger ?? createNullLogger()).child({ module: "config" })
    this.slots = opts.sources.map((source) => ({ source, values: null }))
    this.credentialOptions = { ...DEFAULT_CREDENTIAL_OPTIONS, ...opts.credentialOptions }
    this.overrides = new OverrideStack(
      { declaredOptions: () => new Set(this.optionNames()), logger: this.logger },
      { strict: opts.strictOverride ?? true },
    )
  }

  get sourceNames(): string[] {
    return this.slots.map((slot) => slot.source.name)
  }

  get(name: string): unknown {
    this.logger.trace("Accessing option", { option: name })

    const override = this.overrides.resolve(name)
    if (override.kind === "found") return override.value

    const raw = this.lookup(name)
    if (raw.kind === "missing") throw MissingOptionError.notDeclared(name, this.sourceNames)

    return this.evaluate(raw.value)
  }

  async resolve(name: string): Promise<unknown> {
    return await this.get(name)
  }

  has(name: string): boolean {
    return this.overrides.resolve(name).kind === "found" || this.lookup(name).kind === "found"
  }

  optionNames(): string[] {
    const names = new Set<string>()

    for (const slot of this.slots) {
      for (const key of Object.keys(this.load(slot))) {
        if (isOptionName(key)) names.add(key)
      }
    }

    return [...names].sort()
  }

  async getSecret(path: string): Promise<unknown> {
    this.logger.info("Accessing secret", { path })

    return this.evaluateSecret(new SecretVariable(path))
  }

  async require(...names: string[]): Promise<void> {
    if (names.length === 0) throw new TypeError("You need to specify at least one key")

    const missing: string[] = []
    for (const name of names) {
      try {
        await this.get(name)
      } catch (error) {
        if (!(error instanceof MissingError)) throw error
        missing.push(name)
      }
    }

    if (missing.length > 0) throw MissingOptionError.required(missing)
  }

  /**
   * Every declared option, evaluated. Secret leaves are fetched
   * concurrently and substituted into a fresh copy.
   */
  async exportAll(): Promise<Record<string, unknown>> {
    const raw: Record<string, unknown> = {}

    for (const name of this.optionNames()) {
      const override = this.overrides.resolve(name)
      const found = override.kind === "found" ? override : this.lookup(name)
      if (found.kind === "found") raw[name] = found.value
    }

    return await evaluateTree(raw, (leaf) => this.evaluateLeaf(leaf))
  }

  override(values: OverrideValues): OverrideScope {
    this.scopes++

    return new OverrideScope(this.overrides, values, `override-${this.scopes}`)
  }

  /** Drops every active override layer, e.g. between test cases. */
  resetOverrides(): void {
    this.overrides.deactivateAll()
  }

  /** `{ OPTION: { OVERRIDE_VARIABLE: example } }` for every declared `vault()` option. */
  secretOverrideExamples(): Record<string, Record<string, string>> {
    const examples: Record<string, Record<string, string>> = {}

    for (const name of this.optionNames()) {
      const raw = this.lookup(name)
      if (raw.kind === "found" && raw.value instanceof SecretVariable) {
        examples[name] = raw.value.overrideExample()
      }
    }

    return examples
  }

  extendWithObject(values: Readonly<Record<string, unknown>>, name?: string): void {
    this.slots.push({ source: new ObjectSettingsSource(values, name), values: null })
  }

  extendWithJson(file: string, cwd?: string): void {
    const source = new JsonSettingsSource({ file, required: true, ...(cwd !== undefined && { cwd }) })

    this.slots.push({ source, values: null })
  }

  private load(slot: SourceSlot): Readonly<Record<string, unknown>> {
    if (slot.values === null) {
      slot.values = slot.source.load()
      this.logger.info("Configuration loaded", { source: slot.source.name })
    }

    return slot.values
  }

  private lookup(name: string): Lookup<unknown> {
    for (const slot of [...this.slots].reverse()) {
      const values = this.load(slot)
      if (Object.hasOwn(values, name)) return { kind: "found", value: values[name] }
    }

    return { kind: "missing" }
  }

  private evaluate(raw: unknown): unknown {
    if (isPlainObject(raw)) return evaluateTree(raw, (leaf) => this.evaluateLeaf(leaf))

    return this.evaluateLeaf(raw)
  }

  private evaluateLeaf(value: unknown): unknown {
    if (value instanceof EnvVariable) return value.evaluate(this.environment())
    if (value instanceof SecretVariable) return this.evaluateSecret(value)
    if (value instanceof LazyVariable) return value.evaluate(this)

    return value
  }

  private async evaluateSecret(variable: SecretVariable): Promise<unknown> {
    const { secrets } = this.opts
    if (secrets === undefined) throw new VaultBackendMissingError(variable.path)

    return variable.evaluate(secrets, () => this.credentials(), this.resolutionContext())
  }

  /** Read lazily so an env override can satisfy a secret without them. */
  private async credentials(): Promise<Partial<VaultCredentials>> {
    const names = this.credentialOptions
    const address = toText(await this.get(names.address))
    const [token, username, password] = await Promise.all([
      this.optional(names.token),
      this.optional(names.username),
      this.optional(names.password),
    ])

    return {
      ...(address !== undefined && { address }),
      ...(token !== undefined && { token }),
      ...(username !== undefined && { username }),
      ...(password !== undefined && { password }),
    }
  }

  private async optional(name: string): Promise<string | undefined> {
    try {
      return toText(await this.get(name))
    } catch (error) {
      if (error instanceof MissingError) return undefined
      throw error
    }
  }

  private environment(): EnvRecord {
    if (this.env === null) {
      const base = this.opts.env ?? process.env

      if (this.opts.dotenv === undefined) {
        this.env = base
      } else {
        const dotenv = new DotenvFile(this.opts.dotenv)
        this.env = dotenv.applyTo(base)
        this.logger.info(".env is loaded", { source: dotenv.name })
      }
    }

    return this.env
  }

  private resolutionContext(): ResolutionContext {
    this.context ??= createResolutionContext({
      env: this.environment(),
      ...(this.opts.secretsDisabledVariable !== undefined && {
        secretsDisabledVariable: this.opts.secretsDisabledVariable,
      }),
      ...(this.opts.defaultsDisabledVariable !== undefined && {
        defaultsDisabledVariable: this.opts.defaultsDisabledVariable,
      }),
    })

    return this.context
  }
}
