import type { Milliseconds, Seconds } from "@strata/clock"

type SecondsTtl = { kind: "seconds"; seconds: Seconds }
type MillisecondsTtl = { kind: "milliseconds"; milliseconds: Milliseconds }

export type CacheTtl = SecondsTtl | MillisecondsTtl
