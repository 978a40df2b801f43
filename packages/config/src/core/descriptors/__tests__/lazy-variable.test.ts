import { SecretMissingError } from "@strata/secrets"
import { type MockProxy, mock } from "vitest-mock-extended"
import type { IConfig } from "../../../ports/config"
import { MissingOptionError } from "../../errors"
import { lazy } from "../lazy-variable"

describe("LazyVariable", () => {
  let config: MockProxy<IConfig>

  beforeEach(() => {
    config = mock<IConfig>()
  })

  it("passes the config to the function", () => {
    config.get.calledWith("HOST").mockReturnValue("db.internal")

    const url = lazy((c) => `postgres://${String(c.get("HOST"))}/app`)

    expect(url.evaluate(config)).toBe("postgres://db.internal/app")
  })

  it("casts the result", () => {
    expect(lazy(() => "42", { cast: Number }).evaluate(config)).toBe(42)
  })

  it("uses the default when the function hits a missing option", () => {
    const variable = lazy(
      () => {
        throw MissingOptionError.notDeclared("HOST", ["object"])
      },
      { default: "localhost" },
    )

    expect(variable.evaluate(config)).toBe("localhost")
  })

  it("rethrows a missing option without a default", () => {
    const variable = lazy(() => {
      throw MissingOptionError.notDeclared("HOST", ["object"])
    })

    expect(() => variable.evaluate(config)).toThrow("Option `HOST` is not present in `object`")
  })

  it("does not use the default for other failures", () => {
    const variable = lazy(
      () => {
        throw new TypeError("bad input")
      },
      { default: "unused" },
    )

    expect(() => variable.evaluate(config)).toThrow("bad input")
  })

  describe("async functions", () => {
    it("casts the resolved value", async () => {
      const variable = lazy(async () => "7", { cast: Number })

      await expect(variable.evaluate(config)).resolves.toBe(7)
    })

    it("falls back to the default on a missing secret", async () => {
      const variable = lazy(
        async () => {
          throw new SecretMissingError("team/db", undefined)
        },
        { default: () => "computed default" },
      )

      await expect(variable.evaluate(config)).resolves.toBe("computed default")
    })

    it("rejects with other failures", async () => {
      const variable = lazy(async () => {
        throw new Error("boom")
      })

      await expect(variable.evaluate(config)).rejects.toThrow("boom")
    })
  })
})
