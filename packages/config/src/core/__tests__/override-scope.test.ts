import { ForbiddenOverrideError, OverrideLayerError } from "../errors"
import { OverrideScope } from "../override-scope"
import { OverrideStack } from "../override-stack"

describe("OverrideScope", () => {
  let stack: OverrideStack
  let scope: OverrideScope

  const current = () => {
    const found = stack.resolve("DEBUG")
    return found.kind === "found" ? found.value : "unset"
  }

  beforeEach(() => {
    stack = new OverrideStack({ declaredOptions: () => new Set(["DEBUG", "PORT"]) })
    scope = new OverrideScope(stack, { DEBUG: true }, "override-1")
  })

  describe("enable/disable", () => {
    it("pushes and removes a layer", () => {
      scope.enable()

      expect(current()).toBe(true)
      expect(scope.isEnabled).toBe(true)
      expect(stack.ids).toStrictEqual(["override-1:1"])

      scope.disable()

      expect(current()).toBe("unset")
      expect(scope.isEnabled).toBe(false)
    })

    it("pushes a fresh layer on every enable", () => {
      scope.enable()
      scope.enable()

      expect(stack.ids).toStrictEqual(["override-1:1", "override-1:2"])

      scope.disable()

      expect(stack.ids).toStrictEqual(["override-1:1"])
    })

    it("rejects disable without enable", () => {
      expect(() => scope.disable()).toThrow(OverrideLayerError)
    })

    it("stays disabled when strict validation fails", () => {
      const invalid = new OverrideScope(stack, { NOPE: 1 }, "override-2")

      expect(() => invalid.enable()).toThrow(ForbiddenOverrideError)
      expect(invalid.isEnabled).toBe(false)
      expect(stack.ids).toStrictEqual([])
    })

    it("interleaves with other scopes", () => {
      const other = new OverrideScope(stack, { DEBUG: false }, "override-2")

      scope.enable()
      other.enable()
      expect(current()).toBe(false)

      scope.disable()
      expect(current()).toBe(false)

      other.disable()
      expect(current()).toBe("unset")
    })
  })

  describe("wrap", () => {
    it("applies the override for the duration of the call", () => {
      const add = scope.wrap((a: number, b: number) => ({ sum: a + b, debug: current() }))

      expect(add(1, 2)).toStrictEqual({ sum: 3, debug: true })
      expect(current()).toBe("unset")
    })

    it("disables the override when the function throws", () => {
      const fail = scope.wrap(() => {
        throw new Error("boom")
      })

      expect(fail).toThrow("boom")
      expect(stack.ids).toStrictEqual([])
    })
  })

  describe("wrapAsync", () => {
    it("keeps the override across awaits", async () => {
      const read = scope.wrapAsync(async () => {
        await Promise.resolve()
        return current()
      })

      await expect(read()).resolves.toBe(true)
      expect(current()).toBe("unset")
    })

    it("disables the override when the function rejects", async () => {
      const fail = scope.wrapAsync(async () => {
        throw new Error("boom")
      })

      await expect(fail()).rejects.toThrow("boom")
      expect(stack.ids).toStrictEqual([])
    })
  })

  describe("wrapSuite", () => {
    it("enables before setup and disables after teardown", async () => {
      const seen: unknown[] = []
      const hooks = scope.wrapSuite({
        setup: () => {
          seen.push(current())
        },
        teardown: () => {
          seen.push(current())
        },
      })

      await hooks.setup()
      expect(current()).toBe(true)

      await hooks.teardown()

      expect(seen).toStrictEqual([true, true])
      expect(current()).toBe("unset")
    })

    it("disables and rethrows when setup fails", async () => {
      const hooks = scope.wrapSuite({
        setup: async () => {
          throw new Error("setup failed")
        },
      })

      await expect(hooks.setup()).rejects.toThrow("setup failed")
      expect(stack.ids).toStrictEqual([])
    })

    it("disables even when teardown fails", async () => {
      const hooks = scope.wrapSuite({
        teardown: () => {
          throw new Error("teardown failed")
        },
      })

      await hooks.setup()
      await expect(hooks.teardown()).rejects.toThrow("teardown failed")
      expect(stack.ids).toStrictEqual([])
    })

    it("works without hooks", async () => {
      const hooks = scope.wrapSuite()

      await hooks.setup()
      expect(current()).toBe(true)

      await hooks.teardown()
      expect(current()).toBe("unset")
    })
  })

  describe("wrapClass", () => {
    it("composes with existing static hooks", async () => {
      class Suite {
        static seen: unknown[] = []

        static setupClass() {
          this.seen.push(["setup", current()])
        }

        static teardownClass() {
          this.seen.push(["teardown", current()])
        }
      }

      const Wrapped = scope.wrapClass(Suite)

      expect(Wrapped).toBe(Suite)

      await Wrapped.setupClass()
      await Wrapped.teardownClass()

      expect(Suite.seen).toStrictEqual([
        ["setup", true],
        ["teardown", true],
      ])
      expect(current()).toBe("unset")
    })

    it("adds hooks to a class without any", async () => {
      class Bare {}

      const Wrapped = scope.wrapClass(Bare)

      await Wrapped.setupClass()
      expect(current()).toBe(true)

      await Wrapped.teardownClass()
      expect(current()).toBe("unset")
    })

    it("disables the override when the class setup fails", async () => {
      class Broken {
        static setupClass() {
          throw new Error("class setup failed")
        }
      }

      const Wrapped = scope.wrapClass(Broken)

      await expect(Wrapped.setupClass()).rejects.toThrow("class setup failed")
      expect(stack.ids).toStrictEqual([])
    })
  })
})
