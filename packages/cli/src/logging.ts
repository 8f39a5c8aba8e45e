/**
 * Logging
 *
 * Effect's default logger is replaced by one that writes `LEVEL message`
 * lines to the run's stderr channel.
 */

import { Effect, Logger, LogLevel, type Layer } from "effect"
import type { CliIO } from "./io"

export const LOG_LEVEL_NAMES = ["trace", "debug", "info", "warning", "error", "none"] as const

export type LogLevelName = (typeof LOG_LEVEL_NAMES)[number]

const LOG_LEVELS: Record<LogLevelName, LogLevel.LogLevel> = {
  trace: LogLevel.Trace,
  debug: LogLevel.Debug,
  info: LogLevel.Info,
  warning: LogLevel.Warning,
  error: LogLevel.Error,
  none: LogLevel.None,
}

const renderMessage = (message: unknown): string => {
  const parts: ReadonlyArray<unknown> = Array.isArray(message) ? message : [message]
  return parts.map((part) => (typeof part === "string" ? part : String(part))).join(" ")
}

export const makeLineLogger = (write: (line: string) => void): Logger.Logger<unknown, void> =>
  Logger.make(({ logLevel, message }) => {
    write(`${logLevel.label} ${renderMessage(message)}`)
  })

export const loggerLayer = (io: CliIO): Layer.Layer<never> =>
  Logger.replace(Logger.defaultLogger, makeLineLogger(io.stderr))

/**
 * Run `effect` with the line logger installed and events below `level` dropped.
 */
export const withLogging =
  (io: CliIO, level: LogLevelName) =>
  <A, E, R>(effect: Effect.Effect<A, E, R>): Effect.Effect<A, E, R> =>
    effect.pipe(Logger.withMinimumLogLevel(LOG_LEVELS[level]), Effect.provide(loggerLayer(io)))
