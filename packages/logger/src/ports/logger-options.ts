import type { LogLevelName } from "./log-level"

export type LoggerOptions = {
  /**
   * Minimum level to emit; "info" suppresses "trace" and "debug".
   */
  level: LogLevelName

  /**
   * Human-readable output for local development. Leave off in production,
   * where one JSON object per line is expected.
   */
  prettify?: boolean
}
