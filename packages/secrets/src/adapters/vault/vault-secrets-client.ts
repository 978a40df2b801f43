import { type CacheTtl, MemoryTtlCache, type TtlCache } from "@strata/cache"
import { type Clock, type Milliseconds, SystemClock } from "@strata/clock"
import { isAppError } from "@strata/errors"
import { createNullLogger, type Logger } from "@strata/logger"
import {
  createBackoff,
  createRetryExecutor,
  exponential,
  fullJitter,
  type IRetryExecutor,
  type RetryConfig,
} from "@strata/retry"
import type { ZodType } from "zod"
import {
  SecretMissingError,
  VaultConnectionError,
  VaultRequestError,
} from "../../core/errors"
import { joinSecretPath } from "../../core/secret-path"
import type { SecretPayload, SecretsClient, VaultCredentials } from "../../ports/secrets-client"
import { loginResponseSchema, secretResponseSchema } from "./vault-responses"

export type VaultSecretsClientDeps = {
  /** Defaults to the global `fetch`. */
  fetch?: typeof fetch
  clock?: Clock
  logger?: Logger
}

export type VaultSecretsClientOptions = {
  /** Prepended to every requested path, e.g. `team`. */
  prefix?: string

  /** Cache payloads per full path for this long. `null` disables caching. */
  cacheTtl?: CacheTtl | null

  /** Consult per-secret environment overrides before the backend. Default: true */
  tryEnvFirst?: boolean

  /** Attempts per `load` when the backend is unreachable. Default: 3 */
  maxRetries?: number

  /** Wall-clock budget for those attempts. Default: 15s */
  maxRetryDuration?: Milliseconds

  /** Replaces the retry policy built from the two options above. */
  retry?: RetryConfig
}

type UserPass = { username: string; password: string }

/** Releases the connection of a response whose body is not read. */
async function discardBody(response: Response): Promise<void> {
  await response.body?.cancel()
}

/**
 * Reads KV secrets from a HashiCorp Vault compatible HTTP API.
 *
 * @remarks
 * - Token auth, or userpass login with the session token kept for the
 *   client's lifetime and renewed once when a read answers 403.
 * - Only connectivity failures are retried.
 * - Concurrent cold reads of one path may each reach the network.
 */
export class VaultSecretsClient implements SecretsClient {
  readonly tryEnvFirst: boolean
  readonly prefix: string | undefined

  private readonly fetch: typeof fetch
  private readonly logger: Logger
  private readonly retry: IRetryExecutor
  private readonly retryConfig: RetryConfig
  private readonly cache: TtlCache<SecretPayload> | null
  private token: string | undefined

  constructor(deps: VaultSecretsClientDeps = {}, opts: VaultSecretsClientOptions = {}) {
    const clock = deps.clock ?? new SystemClock()

    this.fetch = deps.fetch ?? globalThis.fetch
    this.logger = (deps.logger ?? createNullLogger()).child({ module: "secrets" })
    this.retry = createRetryExecutor({ clock })
    this.retryConfig = opts.retry ?? this.defaultRetryConfig(opts)
    this.cache = opts.cacheTtl ? new MemoryTtlCache<SecretPayload>({ clock }, { ttl: opts.cacheTtl }) : null
    this.tryEnvFirst = opts.tryEnvFirst ?? true
    this.prefix = opts.prefix
  }

  /** Token obtained by the last userpass login, if any. */
  get sessionToken(): string | undefined {
    return this.token
  }

  async load(path: string, credentials: VaultCredentials): Promise<SecretPayload> {
    const fullPath = joinSecretPath(this.prefix, path)

    return this.retry.execute(
      () => this.loadOnce(path, fullPath, credentials),
      this.retryConfig,
    )
  }

  /** Drops cached payloads; the session token is kept. */
  clearCache(): void {
    this.cache?.clear()
  }

  private async loadOnce(
    path: string,
    fullPath: string,
    credentials: VaultCredentials,
  ): Promise<SecretPayload> {
    const cached = this.cache?.get(fullPath)
    if (cached?.kind === "hit") {
      this.logger.debug("Secret served from cache", { path })
      return cached.value
    }

    const payload = await this.read(path, fullPath, credentials)
    this.cache?.set(fullPath, payload)

    return payload
  }

  private async read(
    path: string,
    fullPath: string,
    credentials: VaultCredentials,
  ): Promise<SecretPayload> {
    const { address } = credentials
    const userPass =
      credentials.username && credentials.password
        ? { username: credentials.username, password: credentials.password }
        : null

    const token =
      credentials.token || (userPass ? await this.sessionFor(address, userPass) : undefined)
    let response = await this.get(address, fullPath, token)

    if (response.status === 403 && userPass) {
      this.logger.debug("Vault token rejected, logging in again", { path })
      await discardBody(response)
      response = await this.get(address, fullPath, await this.login(address, userPass))
    }

    return this.toPayload(response, path, fullPath)
  }

  private async sessionFor(address: string, userPass: UserPass): Promise<string> {
    return this.token ?? this.login(address, userPass)
  }

  private async login(address: string, { username, password }: UserPass): Promise<string> {
    const url = this.endpoint(address, `auth/userpass/login/${encodeURIComponent(username)}`)
    const response = await this.send(url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ password }),
    })

    if (!response.ok) {
      await discardBody(response)
      throw new VaultRequestError("login", response.status, { username })
    }

    const body = await this.parseBody(response, loginResponseSchema, "login", { username })
    this.token = body.auth.client_token

    return this.token
  }

  private get(address: string, fullPath: string, token: string | undefined): Promise<Response> {
    return this.send(this.endpoint(address, fullPath), {
      method: "GET",
      headers: token ? { "X-Vault-Token": token } : {},
    })
  }

  private async toPayload(
    response: Response,
    path: string,
    fullPath: string,
  ): Promise<SecretPayload> {
    if (!response.ok) await discardBody(response)
    if (response.status === 404) throw new SecretMissingError(path, this.prefix)
    if (!response.ok) throw new VaultRequestError("read", response.status, { path: fullPath })

    const body = await this.parseBody(response, secretResponseSchema, "read", { path: fullPath })
    if (body.data === undefined) throw new SecretMissingError(path, this.prefix)

    return body.data
  }

  private async send(url: URL, init: RequestInit): Promise<Response> {
    try {
      return await this.fetch(url, init)
    } catch (error) {
      throw new VaultConnectionError(url.origin, error)
    }
  }

  private async parseBody<T>(
    response: Response,
    schema: ZodType<T>,
    operation: "read" | "login",
    context: Readonly<Record<string, unknown>>,
  ): Promise<T> {
    const text = await response.text()

    let json: unknown
    try {
      json = text === "" ? {} : JSON.parse(text)
    } catch (error) {
      throw new VaultRequestError(operation, response.status, context, "body is not JSON", error)
    }

    const parsed = schema.safeParse(json)
    if (!parsed.success) {
      throw new VaultRequestError(operation, response.status, context, "unexpected body shape")
    }

    return parsed.data
  }

  private endpoint(address: string, path: string): URL {
    const base = address.endsWith("/") ? address : `${address}/`

    return new URL(`v1/${path}`, base)
  }

  private defaultRetryConfig(opts: VaultSecretsClientOptions): RetryConfig {
    return {
      maxAttempts: opts.maxRetries ?? 3,
      maxElapsedMs: opts.maxRetryDuration ?? 15_000,
      delay: createBackoff({
        delay: exponential({ base: { milliseconds: 100 } }),
        jitter: fullJitter(),
        min: { milliseconds: 0 },
        max: { milliseconds: 2_000 },
      }),
      errorPredicate: {
        shouldRetry: (error) => isAppError(error) && error.isRetryable,
      },
      observer: {
        onRetry: (err, info) => {
          this.logger.warn("Vault is unreachable, retrying", {
            attempt: info.attempt + 1,
            ...(info.nextDelayMs !== null && { delayMs: info.nextDelayMs }),
            err,
          })
        },
      },
    }
  }
}
