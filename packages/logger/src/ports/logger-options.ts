import type { LogLevelName } from "./log-level"

/**
 * Policy for a Logger instance: which levels are emitted and whether output
 * is rendered for humans. Adapters decide how to honor it.
 */
export type LoggerOptions = {
  /** Minimum level to emit. "info" suppresses "trace" and "debug". */
  level: LogLevelName

  /**
   * Pretty-print for local development. Keep off in production, where JSON
   * lines go to a log collector.
   */
  prettify?: boolean
}
