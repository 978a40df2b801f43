import { isPlainObject } from "@strata/secrets"

type Tree = Readonly<Record<string, unknown>>

type Slot = {
  target: Record<string, unknown>
  key: string
  pending: PromiseLike<unknown>
}

export function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    typeof value === "object" && value !== null && "then" in value && typeof value.then === "function"
  )
}

/**
 * Copies `tree`, passing every leaf (anything but a nested plain object)
 * through `evaluateLeaf`. The source is never modified.
 *
 * When some leaves evaluate to promises they are awaited together and
 * the copy is returned as a promise; otherwise the copy is returned as is.
 */
export function evaluateTree(
  tree: Tree,
  evaluateLeaf: (value: unknown) => unknown,
): Record<string, unknown> | Promise<Record<string, unknown>> {
  const slots: Slot[] = []

  let copy: Record<string, unknown>
  try {
    copy = copyTree(tree, evaluateLeaf, slots)
  } catch (error) {
    if (slots.length === 0) throw error

    return Promise.allSettled(slots.map((s) => s.pending)).then(() => {
      throw error
    })
  }

  return slots.length === 0 ? copy : settle(copy, slots)
}

/** Plain assignment would treat an own `__proto__` key as the prototype. */
function assign(target: Record<string, unknown>, key: string, value: unknown): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true })
}

function copyTree(
  tree: Tree,
  evaluateLeaf: (value: unknown) => unknown,
  slots: Slot[],
): Record<string, unknown> {
  const copy: Record<string, unknown> = {}

  for (const [key, value] of Object.entries(tree)) {
    if (isPlainObject(value)) {
      assign(copy, key, copyTree(value, evaluateLeaf, slots))
      continue
    }

    const evaluated = evaluateLeaf(value)
    if (isPromiseLike(evaluated)) slots.push({ target: copy, key, pending: evaluated })

    assign(copy, key, evaluated)
  }

  return copy
}

/** Rejects with the first failure in tree order once every leaf has settled. */
async function settle(
  copy: Record<string, unknown>,
  slots: readonly Slot[],
): Promise<Record<string, unknown>> {
  const results = await Promise.allSettled(slots.map((s) => s.pending))

  results.forEach((result, i) => {
    const slot = slots[i]
    if (slot === undefined) return
    if (result.status === "rejected") throw result.reason

    assign(slot.target, slot.key, result.value)
  })

  return copy
}
