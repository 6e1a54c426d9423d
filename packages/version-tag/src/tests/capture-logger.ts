import { Writable } from "node:stream"
import { type LogLevelName, PinoLogger } from "@vtag/logger"

/** A pino-backed logger whose JSON lines are collected in `lines`. */
export function captureLogger(level: LogLevelName = "trace") {
  const lines: Record<string, unknown>[] = []

  const destination = new Writable({
    write(chunk, _encoding, callback) {
      const line = String(chunk).trim()
      if (line) lines.push(JSON.parse(line))
      callback()
    },
  })

  return { logger: new PinoLogger({ destination }, { level }), lines }
}
