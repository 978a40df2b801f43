import { FakeClock } from "@strata/clock"
import { constant } from "@strata/retry"
import { SecretMissingError, VaultConnectionError, VaultRequestError } from "../../../core/errors"
import { captureLogger } from "../../../tests/utils/capture-logger"
import { FakeVault } from "../../../tests/utils/fake-vault"
import { VaultSecretsClient, type VaultSecretsClientOptions } from "../vault-secrets-client"

const address = "http://vault.test:8200"
const tokenAuth = { address, token: "test-token" }
const userPass = { address, username: "app", password: "test-password" }

describe("VaultSecretsClient", () => {
  let clock: FakeClock
  let vault: FakeVault

  beforeEach(() => {
    clock = new FakeClock(1_000_000)
    vault = new FakeVault({
      secrets: { "team/path/to": { SECRET: "value" } },
      users: { app: "test-password" },
      tokens: ["test-token"],
    })
  })

  function makeClient(opts: VaultSecretsClientOptions = {}) {
    return new VaultSecretsClient({ fetch: vault.fetch, clock }, { prefix: "team", ...opts })
  }

  describe("token auth", () => {
    it("sends the token and reads the prefixed path", async () => {
      const client = makeClient()

      await expect(client.load("path/to", tokenAuth)).resolves.toStrictEqual({ SECRET: "value" })
      expect(vault.requests).toStrictEqual([
        { method: "GET", path: "/v1/team/path/to", token: "test-token" },
      ])
    })

    it("accepts an address with a trailing slash", async () => {
      const client = makeClient()

      await client.load("path/to", { ...tokenAuth, address: `${address}/` })

      expect(vault.requests[0]?.path).toBe("/v1/team/path/to")
    })

    it("prefers the explicit token over userpass", async () => {
      const client = makeClient()

      await client.load("path/to", { ...userPass, token: "test-token" })

      expect(vault.logins).toBe(0)
    })

    it("fails on 403 without retrying when userpass is not configured", async () => {
      const client = makeClient()

      const err = await client
        .load("path/to", { address, token: "revoked-token" })
        .catch((e: unknown) => e)

      expect(err).toBeInstanceOf(VaultRequestError)
      expect(err).toHaveProperty("status", 403)
      expect(err).toHaveProperty("message", "Vault read failed with status 403")
      expect(vault.requests).toHaveLength(1)
    })
  })

  describe("userpass auth", () => {
    it("logs in once and reuses the session token", async () => {
      const client = makeClient()

      await client.load("path/to", userPass)
      await client.load("path/to", userPass)

      expect(vault.requests).toStrictEqual([
        { method: "POST", path: "/v1/auth/userpass/login/app", token: null },
        { method: "GET", path: "/v1/team/path/to", token: "issued-token-1" },
        { method: "GET", path: "/v1/team/path/to", token: "issued-token-1" },
      ])
      expect(client.sessionToken).toBe("issued-token-1")
    })

    it("re-authenticates exactly once when a stale token is rejected", async () => {
      const client = makeClient()

      const payload = await client.load("path/to", { ...userPass, token: "stale-token" })

      expect(payload).toStrictEqual({ SECRET: "value" })
      expect(vault.logins).toBe(1)
      expect(vault.requests.map((r) => r.token)).toStrictEqual([
        "stale-token",
        null,
        "issued-token-1",
      ])
    })

    it("renews an expired session token", async () => {
      const client = makeClient()
      await client.load("path/to", userPass)

      vault.revokeTokens()
      await client.load("path/to", userPass)

      expect(vault.logins).toBe(2)
      expect(vault.reads).toBe(3)
      expect(client.sessionToken).toBe("issued-token-2")
    })

    it("reports a rejected login", async () => {
      const client = makeClient()

      const err = await client
        .load("path/to", { ...userPass, password: "wrong-password" })
        .catch((e: unknown) => e)

      expect(err).toBeInstanceOf(VaultRequestError)
      expect(err).toHaveProperty("message", "Vault login failed with status 400")
      expect(vault.requests).toHaveLength(1)
    })
  })

  describe("missing secrets", () => {
    it("maps 404 to SecretMissingError", async () => {
      const client = makeClient()

      const err = await client.load("other", tokenAuth).catch((e: unknown) => e)

      expect(err).toBeInstanceOf(SecretMissingError)
      expect(err).toHaveProperty("message", "Option `other` is not present in Vault (team)")
      expect(vault.requests).toHaveLength(1)
    })

    it("treats a response without data as missing", async () => {
      vault.setSecret("team/empty", null)
      const client = makeClient()

      await expect(client.load("empty", tokenAuth)).rejects.toBeInstanceOf(SecretMissingError)
    })

    it("names the absent prefix", async () => {
      const client = new VaultSecretsClient({ fetch: vault.fetch, clock })

      await expect(client.load("nothing", tokenAuth)).rejects.toThrow(
        "Option `nothing` is not present in Vault (no prefix)",
      )
    })
  })

  describe("unread response bodies", () => {
    let responses: Response[]

    function makeRecordingClient() {
      responses = []
      const recordingFetch: typeof fetch = async (input, init) => {
        const response = await vault.fetch(input, init)
        responses.push(response)
        return response
      }

      return new VaultSecretsClient({ fetch: recordingFetch, clock }, { prefix: "team" })
    }

    it("are released on 404", async () => {
      await expect(makeRecordingClient().load("other", tokenAuth)).rejects.toBeInstanceOf(
        SecretMissingError,
      )
      expect(responses.map((r) => [r.status, r.bodyUsed])).toStrictEqual([[404, true]])
    })

    it("are released on a rejected read", async () => {
      const client = makeRecordingClient()

      await expect(client.load("path/to", { address, token: "revoked-token" })).rejects.toBeInstanceOf(
        VaultRequestError,
      )
      expect(responses.map((r) => [r.status, r.bodyUsed])).toStrictEqual([[403, true]])
    })

    it("are released before logging in again", async () => {
      const client = makeRecordingClient()

      await client.load("path/to", { ...userPass, token: "stale-token" })

      expect(responses.map((r) => [r.status, r.bodyUsed])).toStrictEqual([
        [403, true],
        [200, true],
        [200, true],
      ])
    })

    it("are released on a failed login", async () => {
      const client = makeRecordingClient()

      await expect(
        client.load("path/to", { ...userPass, password: "wrong-password" }),
      ).rejects.toBeInstanceOf(VaultRequestError)
      expect(responses.map((r) => [r.status, r.bodyUsed])).toStrictEqual([[400, true]])
    })
  })

  describe("retries", () => {
    it("attempts an unreachable backend exactly maxRetries times", async () => {
      vault.goOffline()
      const client = makeClient()

      const err = await client.load("path/to", tokenAuth).catch((e: unknown) => e)

      expect(err).toBeInstanceOf(VaultConnectionError)
      expect(err).toHaveProperty("message", "Can't connect to Vault at http://vault.test:8200")
      expect(err).toHaveProperty("cause", new TypeError("fetch failed"))
      expect(vault.requests).toHaveLength(3)
    })

    it("honours a custom attempt count", async () => {
      vault.goOffline()
      const client = makeClient({ maxRetries: 5 })

      await expect(client.load("path/to", tokenAuth)).rejects.toBeInstanceOf(VaultConnectionError)
      expect(vault.requests).toHaveLength(5)
    })

    it("recovers when the backend comes back", async () => {
      vault.failNext(2)
      const client = makeClient()

      await expect(client.load("path/to", tokenAuth)).resolves.toStrictEqual({ SECRET: "value" })
      expect(vault.requests).toHaveLength(3)
    })

    it("stops once the retry duration is spent", async () => {
      vault.goOffline()
      const client = makeClient({ maxRetries: 5, maxRetryDuration: 0 })

      await expect(client.load("path/to", tokenAuth)).rejects.toBeInstanceOf(VaultConnectionError)
      expect(vault.requests).toHaveLength(1)
    })

    it("uses an injected retry policy", async () => {
      vault.goOffline()
      const client = makeClient({
        retry: { maxAttempts: 4, delay: constant({ milliseconds: 10 }) },
      })

      await expect(client.load("path/to", tokenAuth)).rejects.toBeInstanceOf(VaultConnectionError)
      expect(vault.requests).toHaveLength(4)
      expect(clock.sleeps).toStrictEqual([10, 10, 10])
    })

    it("logs a warning per retry", async () => {
      vault.failNext(2)
      const { logger, lines } = captureLogger()
      const client = new VaultSecretsClient({ fetch: vault.fetch, clock, logger }, { prefix: "team" })

      await client.load("path/to", tokenAuth)

      const warnings = lines.filter((l) => l["msg"] === "Vault is unreachable, retrying")
      expect(warnings.map((l) => [l["level"], l["module"], l["attempt"]])).toStrictEqual([
        [40, "secrets", 1],
        [40, "secrets", 2],
      ])
    })
  })

  describe("cache", () => {
    it("serves repeated reads from memory within the TTL", async () => {
      const client = makeClient({ cacheTtl: { kind: "seconds", seconds: 1 } })

      const first = await client.load("path/to", tokenAuth)
      clock.advance(500)
      const second = await client.load("path/to", tokenAuth)

      expect(second).toBe(first)
      expect(vault.reads).toBe(1)
    })

    it("reads again once the TTL has elapsed", async () => {
      const client = makeClient({ cacheTtl: { kind: "seconds", seconds: 1 } })

      await client.load("path/to", tokenAuth)
      clock.advance(1_100)
      await client.load("path/to", tokenAuth)

      expect(vault.reads).toBe(2)
    })

    it("keys entries by the joined path", async () => {
      const client = makeClient({ cacheTtl: { kind: "seconds", seconds: 60 } })

      await client.load("path/to", tokenAuth)
      await client.load("/path/to/", tokenAuth)

      expect(vault.reads).toBe(1)
    })

    it("does not cache without a TTL", async () => {
      const client = makeClient()

      await client.load("path/to", tokenAuth)
      await client.load("path/to", tokenAuth)

      expect(vault.reads).toBe(2)
    })

    it("clearCache() forces a fresh read", async () => {
      const client = makeClient({ cacheTtl: { kind: "seconds", seconds: 60 } })

      await client.load("path/to", tokenAuth)
      client.clearCache()
      await client.load("path/to", tokenAuth)

      expect(vault.reads).toBe(2)
    })
  })

  it("tries the environment first unless told otherwise", () => {
    expect(makeClient().tryEnvFirst).toBe(true)
    expect(makeClient({ tryEnvFirst: false }).tryEnvFirst).toBe(false)
  })
})
