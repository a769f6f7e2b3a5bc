import type { LogLevelName } from "./log-level"

/**
 * Policy for a Logger instance: which levels are emitted and how they render.
 * Adapters decide how to honor it.
 */
export type LoggerOptions = {
  /** Minimum level to emit; "info" suppresses "trace" and "debug". */
  level: LogLevelName

  /**
   * Pretty-print for humans. Meant for local development; production keeps
   * structured JSON lines.
   */
  prettify?: boolean
}
