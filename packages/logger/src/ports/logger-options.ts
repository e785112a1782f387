import type { LogLevelName } from "./log-level"

export type LoggerOptions = {
  /**
   * Minimum log level to emit.
   *
   * Example: "info" will suppress "trace" and "debug" logs.
   */
  level: LogLevelName

  /**
   * Pretty-print for humans instead of one JSON object per line.
   * Meant for local development only.
   */
  prettify?: boolean
}
