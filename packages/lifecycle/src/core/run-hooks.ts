import type { Clock, UnixMs } from "@murmur/clock"
import type { Logger } from "@murmur/logger"
import type { HookFailure, HookPhase, LifecycleHook } from "../ports/lifecycle-hook"

export type RunHooksContext = {
  phase: HookPhase
  clock: Clock
  logger: Logger
  deadlineMs: UnixMs
}

export type RunHooksPolicy = {
  /** Stop at the first failing hook. Startup uses this; shutdown does not. */
  failFast?: boolean
}

type HookOutcome = { failure?: HookFailure; timedOut: boolean }

/**
 * Runs hooks one after another against a shared deadline. Each hook gets a
 * signal that aborts when the deadline passes.
 */
export async function runHooks(
  ctx: RunHooksContext,
  hooks: readonly LifecycleHook[],
  policy: RunHooksPolicy = {},
): Promise<{ failures: HookFailure[]; timedOut: boolean }> {
  const failures: HookFailure[] = []

  for (const hook of hooks) {
    const outcome = await runHook(ctx, hook)

    if (outcome.failure) {
      failures.push(outcome.failure)
      if (policy.failFast) return { failures, timedOut: outcome.timedOut }
    }

    if (outcome.timedOut) return { failures, timedOut: true }
  }

  return { failures, timedOut: false }
}

async function runHook(ctx: RunHooksContext, hook: LifecycleHook): Promise<HookOutcome> {
  const { phase, logger } = ctx
  const msLeft = Math.max(0, ctx.deadlineMs - ctx.clock.nowMs())

  if (msLeft <= 0) {
    logger.warn(`Skipping remaining ${phase} hooks due to timeout`, { phase, hook: hook.name })
    return { timedOut: true }
  }

  const controller = new AbortController()
  const timer = setTimeout(() => controller.abort(), msLeft)

  const expired = () => controller.signal.aborted || ctx.clock.nowMs() >= ctx.deadlineMs

  try {
    await hook.fn({ signal: controller.signal, timeRemainingMs: msLeft })

    if (expired()) {
      logger.warn(`${phase} deadline exceeded during hook`, { phase, hook: hook.name })
      return { timedOut: true }
    }

    logger.info(`Executed ${phase} hook: ${hook.name}`)

    return { timedOut: false }
  } catch (err) {
    logger.error(`${phase} hook failed: ${hook.name}`, { phase, err })

    return { failure: { hook: hook.name, error: err }, timedOut: expired() }
  } finally {
    clearTimeout(timer)
  }
}
