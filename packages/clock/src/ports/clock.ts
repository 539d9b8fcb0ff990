import type { Milliseconds, UnixMs } from "./time"

export type TimeSource = {
  /**
   * Current time as a Date object.
   *
   * @remarks
   * Use for display and timestamps. Prefer `nowMs()` for arithmetic.
   */
  now(): Date

  /** Current time as milliseconds since Unix epoch. */
  nowMs(): UnixMs
}

export interface Sleeper {
  /**
   * Delay execution for `ms` milliseconds.
   *
   * Resolves early (never rejects) if `signal` is aborted, so callers check
   * `signal.aborted` afterwards to tell the two apart.
   */
  sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void>
}

export type Clock = TimeSource & Sleeper
