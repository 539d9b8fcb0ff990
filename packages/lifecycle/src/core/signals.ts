import type { Logger } from "@murmur/logger"
import type { PhaseResult } from "../ports/lifecycle-hook"

export interface SignalHandlerContext {
  logger: Logger
  stop?: () => Promise<PhaseResult>
  /** Budget for the stop path after a fatal error. @default 10_000 */
  fatalTimeoutMs?: number
}

export interface SignalHandler {
  unregister: () => void
}

/**
 * SIGINT and SIGTERM run `stop()` once and let the process end on its own.
 * Uncaught errors run `stop()` under a force-exit timer, then exit with 1.
 * A fatal error while already stopping exits at once.
 */
export function setupProcessHandlers(ctx: SignalHandlerContext): SignalHandler {
  const fatalTimeoutMs = ctx.fatalTimeoutMs ?? 10_000
  let stopping = false

  const onSignal = (signal: NodeJS.Signals) => {
    ctx.logger.info("Received signal", { signal })

    if (stopping) return
    stopping = true

    ctx.logger.warn("Shutdown triggered", { reason: signal })
    void runStop(ctx, signal)
  }

  const onFatal = (reason: string, err: unknown) => {
    if (stopping) {
      ctx.logger.fatal("Fatal error during shutdown", { reason, err })
      process.exit(1)
      return
    }
    stopping = true

    ctx.logger.fatal("Fatal error", { reason, err })
    void stopThenExit(ctx, reason, fatalTimeoutMs)
  }

  const sigint = () => onSignal("SIGINT")
  const sigterm = () => onSignal("SIGTERM")
  const uncaught = (err: Error) => onFatal("uncaughtException", err)
  const rejection = (reason: unknown) => onFatal("unhandledRejection", reason)

  process.on("SIGINT", sigint)
  process.on("SIGTERM", sigterm)
  process.on("uncaughtException", uncaught)
  process.on("unhandledRejection", rejection)

  return {
    unregister: () => {
      process.off("SIGINT", sigint)
      process.off("SIGTERM", sigterm)
      process.off("uncaughtException", uncaught)
      process.off("unhandledRejection", rejection)
    },
  }
}

async function runStop(ctx: SignalHandlerContext, reason: string): Promise<void> {
  if (!ctx.stop) {
    ctx.logger.warn("No stop handler registered", { reason })
    return
  }

  try {
    const result = await ctx.stop()

    if (!result.ok) {
      ctx.logger.error("Shutdown completed with issues", {
        reason,
        failureCount: result.failures.length,
        timedOut: result.timedOut,
      })
    }
  } catch (err) {
    ctx.logger.error("Shutdown failed", { reason, err })
  }
}

async function stopThenExit(
  ctx: SignalHandlerContext,
  reason: string,
  timeoutMs: number,
): Promise<void> {
  const timer = setTimeout(() => {
    ctx.logger.fatal("Forced exit after timeout", { timeoutMs })
    process.exit(1)
  }, timeoutMs)
  timer.unref()

  try {
    await runStop(ctx, reason)
  } finally {
    clearTimeout(timer)
  }

  process.exit(1)
}

export type SetupProcessHandlersFn = typeof setupProcessHandlers
