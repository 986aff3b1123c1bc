import type { LogLevelName } from "./log-level"

/**
 * Logging policy. Adapters decide how to honor it.
 */
export type LoggerOptions = {
  /** Entries below this level are dropped. */
  level: LogLevelName

  /**
   * Human-readable output for local work. Production keeps this off so log
   * processors receive JSON lines.
   */
  prettify?: boolean
}
