import type { LogLevelName } from "./log-level"

/**
 * Policy shared by every logger adapter.
 */
export type LoggerOptions = {
  /**
   * Minimum level to emit. "info" suppresses "trace" and "debug".
   */
  level: LogLevelName

  /**
   * Human-readable output for local use. Leave off where logs are ingested
   * as JSON.
   */
  prettify?: boolean
}
