export type Found<T> = { kind: "found"; value: T }
export type NotFound = { kind: "missing" }

/** Result of a lookup where "absent" is an expected answer, not a failure. */
export type Lookup<T> = Found<T> | NotFound
