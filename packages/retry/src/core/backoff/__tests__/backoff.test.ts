import type { RandomSource } from "../../../ports/random-source"
import { constant } from "../constant"
import { createBackoff } from "../create-backoff"
import { exponential } from "../exponential"
import { fullJitter } from "../full-jitter"

const fixedRandom = (value: number): RandomSource => ({
  next: () => value,
})

describe("delay policies", () => {
  it("constant() returns the same delay for every attempt", () => {
    const policy = constant({ milliseconds: 100 })

    expect([0, 1, 5].map((a) => policy.getDelay(a).milliseconds)).toEqual([100, 100, 100])
  })

  it("exponential() doubles by default", () => {
    const policy = exponential({ base: { milliseconds: 100 } })

    expect([0, 1, 2].map((a) => policy.getDelay(a).milliseconds)).toEqual([100, 200, 400])
  })

  it("exponential() honours a custom factor", () => {
    const policy = exponential({ base: { milliseconds: 10 }, factor: 3 })

    expect(policy.getDelay(2)).toEqual({ milliseconds: 90 })
  })
})

describe("fullJitter", () => {
  it.each([
    [0, 0],
    [0.5, 50],
    [0.999, 100],
  ])("random %d maps 100ms to %dms", (random, expected) => {
    expect(fullJitter(fixedRandom(random)).apply({ milliseconds: 100 })).toEqual({
      milliseconds: expected,
    })
  })
})

describe("createBackoff", () => {
  it("composes strategy and jitter", () => {
    const policy = createBackoff({
      delay: exponential({ base: { milliseconds: 100 } }),
      jitter: fullJitter(fixedRandom(0.5)),
      min: { milliseconds: 0 },
      max: { milliseconds: 10_000 },
    })

    expect([0, 1, 2].map((a) => policy.getDelay(a).milliseconds)).toEqual([50, 100, 200])
  })

  it("clamps into [min, max]", () => {
    const policy = createBackoff({
      delay: exponential({ base: { milliseconds: 10 } }),
      min: { milliseconds: 15 },
      max: { milliseconds: 30 },
    })

    expect([0, 1, 2].map((a) => policy.getDelay(a).milliseconds)).toEqual([15, 20, 30])
  })

  it("falls back to min for non-finite or negative delays", () => {
    const policy = createBackoff({
      delay: { getDelay: () => ({ milliseconds: Number.NaN }) },
      jitter: { apply: () => ({ milliseconds: -5 }) },
      min: { milliseconds: 7 },
      max: { milliseconds: 100 },
    })

    expect(policy.getDelay(0)).toEqual({ milliseconds: 7 })
  })

  it.each([
    [{ milliseconds: -1 }, { milliseconds: 10 }],
    [{ milliseconds: 0 }, { milliseconds: Number.POSITIVE_INFINITY }],
    [{ milliseconds: 20 }, { milliseconds: 10 }],
  ])("rejects bounds min=%o max=%o", (min, max) => {
    expect(() => createBackoff({ delay: constant({ milliseconds: 1 }), min, max })).toThrow(
      RangeError,
    )
  })
})
