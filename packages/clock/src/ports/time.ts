export type Milliseconds = number
export type Seconds = number

/** Milliseconds since the Unix epoch. */
export type UnixMs = Milliseconds
