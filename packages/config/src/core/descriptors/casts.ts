import { z } from "zod"
import { InvalidCastError } from "../errors"

const booleanSchema = z.stringbool({
  truthy: ["1", "yes", "true", "on"],
  falsy: ["0", "no", "false", "off", ""],
})
const numberSchema = z.string().min(1).pipe(z.coerce.number())
const integerSchema = z.string().min(1).pipe(z.coerce.number<string>().int())

function parseWith<T>(schema: z.ZodType<T>, expected: string) {
  return (value: string): T => {
    const parsed = schema.safeParse(value.trim())
    if (!parsed.success) throw new InvalidCastError(value, expected)

    return parsed.data
  }
}

/** Comma-separated values, each passed through `item` when given. */
function list(): (value: string) => string[]
function list<T>(item: (value: string) => T): (value: string) => T[]
function list<T>(item?: (value: string) => T): (value: string) => Array<T | string> {
  return (value) => value.split(",").map((part) => (item ? item(part) : part))
}

/** Casts for values read from the environment, where everything is a string. */
export const casts = {
  /** `1/yes/true/on`, `0/no/false/off` or empty; case-insensitive. */
  boolean: parseWith(booleanSchema, "boolean"),
  number: parseWith(numberSchema, "number"),
  integer: parseWith(integerSchema, "integer"),

  list,

  json: (value: string): unknown => {
    try {
      return JSON.parse(value)
    } catch (error) {
      throw new InvalidCastError(value, "JSON", error)
    }
  },
}
