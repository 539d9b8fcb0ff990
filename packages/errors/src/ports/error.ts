export type ErrorCode = Lowercase<string>

/** Structured data attached to an error, e.g. the key of the message being edited. */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode

  readonly context: ErrorContext

  /** `true` when repeating the same call might succeed (flood waits, timeouts). */
  readonly isRetryable: boolean

  /**
   * Expected runtime failure (`true`) versus a bug or broken invariant (`false`).
   *
   * @remarks
   * A failed download or a non-zero ffmpeg exit is operational. A job that
   * reaches an impossible stage is not.
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/** JSON-safe error shape used by log output. */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
