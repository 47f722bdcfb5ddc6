import { Writable } from "node:stream"
import type { CapturedLog, LoggerHarness } from "../../../ports/__tests__/logger-harness"
import type { LogLevelName } from "../../../ports/log-level"
import { PinoLogger } from "../pino-logger"

const pinoLevelToName: Record<number, LogLevelName> = {
  10: "trace",
  20: "debug",
  30: "info",
  40: "warn",
  50: "error",
  60: "fatal",
}

export function captureLines() {
  const lines: Record<string, unknown>[] = []

  const destination = new Writable({
    write(chunk, _encoding, callback) {
      const line = String(chunk).trim()
      if (line) lines.push(JSON.parse(line))
      callback()
    },
  })

  return { lines, destination }
}

export function pinoHarness(): LoggerHarness {
  return {
    name: "PinoLogger",
    make: (opts) => {
      const { lines, destination } = captureLines()

      return {
        logger: new PinoLogger({ destination }, { level: opts?.level ?? "trace" }),
        read: () =>
          lines.map(
            (payload): CapturedLog => ({
              level: pinoLevelToName[Number(payload.level)] ?? "info",
              payload,
            }),
          ),
      }
    },
  }
}
