// ─── Logger Service ────────────────────────────────────────────
// Effect: Console I/O (structured, timestamped logging)
// All log output goes through this service. The minimum level is
// read from LOG_LEVEL so noisy debug lines stay off by default.

import { Config, Context, Effect, Layer } from "effect"

// ─── Service Definition ────────────────────────────────────────

type LogFn = (
  message: string,
  data?: Record<string, unknown>
) => Effect.Effect<void>

export class Logger extends Context.Tag("@analytics/Logger")<
  Logger,
  {
    readonly debug: LogFn
    readonly info: LogFn
    readonly warn: LogFn
    readonly error: LogFn
  }
>() {}

export type LogLevel = "debug" | "info" | "warn" | "error"

const SEVERITY: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 }

// ─── Formatting Helper ─────────────────────────────────────────

export const formatLog = (
  level: LogLevel,
  message: string,
  data: Record<string, unknown> | undefined,
  now: Date
): string => {
  const extra = data ? `  ${JSON.stringify(data)}` : ""
  return `[${now.toISOString()}] ${level.toUpperCase().padEnd(5)} ${message}${extra}`
}

// ─── Console Implementation ────────────────────────────────────

const SINKS: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.log(line),
  info: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
}

export const makeConsoleLogger = (minLevel: LogLevel): Context.Tag.Service<Logger> => {
  const at =
    (level: LogLevel): LogFn =>
    (message, data) =>
      SEVERITY[level] < SEVERITY[minLevel]
        ? Effect.void
        : Effect.sync(() => SINKS[level](formatLog(level, message, data, new Date())))

  return { debug: at("debug"), info: at("info"), warn: at("warn"), error: at("error") }
}

export const LoggerLive = Layer.effect(
  Logger,
  Effect.map(
    Config.literal("debug", "info", "warn", "error")("LOG_LEVEL").pipe(
      Config.withDefault("info" as const)
    ),
    makeConsoleLogger
  )
)

// ─── Silent Implementation (for tests) ─────────────────────────

export const LoggerSilent = Layer.succeed(Logger, {
  debug: () => Effect.void,
  info: () => Effect.void,
  warn: () => Effect.void,
  error: () => Effect.void,
})
