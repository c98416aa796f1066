import type { LogLevelName } from "./log-level"

/**
 * Logging policy. Adapters decide how to honor it.
 */
export type LoggerOptions = {
  /** Entries below this level are dropped. */
  level: LogLevelName

  /**
   * Pretty-print for humans (local development). Leave off where logs are
   * ingested as JSON.
   */
  prettify?: boolean
}
