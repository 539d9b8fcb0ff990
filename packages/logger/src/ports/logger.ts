import type { LogContext, LogContextPatch, LogMeta } from "./log-context"

export interface Logger<TContext extends LogContext = LogContext> {
  trace(message: string, meta?: LogMeta<TContext>): void
  debug(message: string, meta?: LogMeta<TContext>): void
  info(message: string, meta?: LogMeta<TContext>): void
  warn(message: string, meta?: LogMeta<TContext>): void
  error(message: string, meta?: LogMeta<TContext>): void
  fatal(message: string, meta?: LogMeta<TContext>): void

  /**
   * Creates a child logger that inherits the parent context and adds
   * `context` to every entry it emits. Keys in `context` override the
   * parent's on conflict; the parent is left untouched.
   *
   * Used to scope logs to a chat, a job or a pipeline stage.
   */
  child<U extends LogContextPatch>(context: U): Logger<TContext & U>
}
