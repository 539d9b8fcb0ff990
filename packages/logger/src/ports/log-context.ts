export type LogContext = {
  service: string
  module: string
  env: string

  chatId: string
  chat: string
  messageId: number
  messageDate: string

  job: string
  stage: string
}

export type LogEvent = {
  err: unknown
}

/**
 * Per-call structured fields.
 *
 * Known context keys keep their types; anything else is accepted as-is so
 * call sites can attach ad-hoc diagnostics without widening `LogContext`.
 */
export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/** A partial overlay applied to an existing context by `child()`. */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
