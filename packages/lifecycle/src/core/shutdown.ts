import type { Clock, UnixMs } from "@murmur/clock"
import type { Logger } from "@murmur/logger"
import type { LifecycleHook, PhaseResult } from "../ports/lifecycle-hook"
import { runHooks } from "./run-hooks"

export type ShutdownContext = {
  clock: Clock
  logger: Logger
  deadlineMs: UnixMs
  stopHooks: readonly LifecycleHook[]
}

/** Every stop hook runs even when an earlier one fails. */
export async function shutdown(ctx: ShutdownContext): Promise<PhaseResult> {
  ctx.logger.warn("Shutting down gracefully")

  const { failures, timedOut } = await runHooks(
    { phase: "shutdown", clock: ctx.clock, logger: ctx.logger, deadlineMs: ctx.deadlineMs },
    ctx.stopHooks,
    { failFast: false },
  )

  ctx.logger.info("Shutdown complete", { failureCount: failures.length, timedOut })

  return { ok: failures.length === 0 && !timedOut, failures, timedOut }
}

export type ShutdownFn = typeof shutdown
