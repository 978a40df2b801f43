import { Writable } from "node:stream"
import { PinoLogger } from "@strata/logger"

/** Trace-level PinoLogger whose JSON lines are collected in memory. */
export function captureLogger() {
  const lines: Record<string, unknown>[] = []

  const destination = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      const line = chunk.toString("utf8").trim()
      if (line) lines.push(JSON.parse(line))
      callback()
    },
  })

  return { logger: new PinoLogger({ destination }, { level: "trace" }), lines }
}
