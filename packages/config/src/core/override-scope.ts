import { OverrideLayerError } from "./errors"
import type { OverrideStack, OverrideValues } from "./override-stack"

export type SuiteHooks = {
  setup?: () => void | Promise<void>
  teardown?: () => void | Promise<void>
}

export type WrappedSuiteHooks = {
  setup: () => Promise<void>
  teardown: () => Promise<void>
}

export type WrappedSuiteClass = {
  setupClass: () => Promise<void>
  teardownClass: () => Promise<void>
}

/** A class with optional static suite hooks, as used by {@link OverrideScope.wrapClass}. */
export type SuiteClass = (abstract new (...args: never[]) => unknown) & {
  setupClass?: () => void | Promise<void>
  teardownClass?: () => void | Promise<void>
}

/**
 * One set of override values and the ways to apply it.
 *
 * Every `enable()` pushes a fresh layer; `disable()` removes the newest
 * layer this scope pushed.
 *
 * @example
 * ```ts
 * const scope = config.override({ DEBUG: true })
 *
 * const hooks = scope.wrapSuite()
 * beforeAll(hooks.setup)
 * afterAll(hooks.teardown)
 * ```
 */
export class OverrideScope {
  private readonly layers: string[] = []
  private counter = 0

  constructor(
    private readonly stack: OverrideStack,
    readonly values: OverrideValues,
    readonly id: string,
  ) {}

  get isEnabled(): boolean {
    return this.layers.length > 0
  }

  enable(): void {
    const layer = `${this.id}:${++this.counter}`

    this.stack.activate(layer, this.values)
    this.layers.push(layer)
  }

  disable(): void {
    const layer = this.layers.pop()
    if (layer === undefined) throw OverrideLayerError.unknown(this.id)

    this.stack.deactivate(layer)
  }

  wrap<A extends unknown[], R>(fn: (...args: A) => R): (...args: A) => R {
    return (...args) => {
      this.enable()
      try {
        return fn(...args)
      } finally {
        this.disable()
      }
    }
  }

  wrapAsync<A extends unknown[], R>(fn: (...args: A) => Promise<R>): (...args: A) => Promise<R> {
    return async (...args) => {
      this.enable()
      try {
        return await fn(...args)
      } finally {
        this.disable()
      }
    }
  }

  /**
   * Hooks for a suite's `beforeAll`/`afterAll`. The override is active
   * before `setup` runs; a failing `setup` disables it again and rethrows.
   * `teardown` always disables it.
   */
  wrapSuite(hooks: SuiteHooks = {}): WrappedSuiteHooks {
    return {
      setup: async () => {
        this.enable()
        try {
          await hooks.setup?.()
        } catch (error) {
          this.disable()
          throw error
        }
      },
      teardown: async () => {
        try {
          await hooks.teardown?.()
        } finally {
          this.disable()
        }
      },
    }
  }

  /** Replaces the static `setupClass`/`teardownClass` hooks of `cls` with wrapped ones. */
  wrapClass<T extends SuiteClass>(cls: T): T & WrappedSuiteClass {
    const setup = cls.setupClass
    const teardown = cls.teardownClass
    const hooks = this.wrapSuite({
      ...(setup !== undefined && { setup: () => setup.call(cls) }),
      ...(teardown !== undefined && { teardown: () => teardown.call(cls) }),
    })

    return Object.assign(cls, { setupClass: hooks.setup, teardownClass: hooks.teardown })
  }
}
