import type { Clock, Milliseconds } from "@murmur/clock"
import type { Logger } from "@murmur/logger"
import type { LifecycleHook, PhaseResult } from "../ports/lifecycle-hook"
import { LifecycleError } from "./lifecycle-error"
import { type ShutdownFn, shutdown } from "./shutdown"
import { type SetupProcessHandlersFn, type SignalHandler, setupProcessHandlers } from "./signals"
import { type StartupFn, startup } from "./startup"

export type RunnerDeps = {
  clock: Clock
  logger: Logger
}

export type RunnerOptions = {
  startHooks: LifecycleHook[]
  stopHooks: LifecycleHook[]
  startupTimeoutMs: Milliseconds
  shutdownTimeoutMs: Milliseconds
}

export type RunnerCollabs = {
  startup: StartupFn
  shutdown: ShutdownFn
  setupProcessHandlers: SetupProcessHandlersFn
}

export interface RunnerHandle {
  /** Runs the stop hooks once. Later calls return the same result. */
  stop(): Promise<PhaseResult>
}

export interface Runner {
  setupProcessHandlers(): this
  start(): Promise<RunnerHandle>
}

type RunnerState = "idle" | "starting" | "started"

const defaultCollabs: RunnerCollabs = { startup, shutdown, setupProcessHandlers }

/**
 * Process-level start/stop for a long-running service.
 *
 * A failed startup runs the stop hooks to release whatever did start, then
 * rejects with `LifecycleError`.
 */
export function createRunner(
  deps: RunnerDeps,
  options: RunnerOptions,
  collabs: RunnerCollabs = defaultCollabs,
): Runner {
  const { clock, logger } = deps

  let state: RunnerState = "idle"
  let handle: RunnerHandle | undefined
  let signalHandler: SignalHandler | undefined

  const createHandle = (): RunnerHandle => {
    let stopping: Promise<PhaseResult> | undefined

    const runStop = async (): Promise<PhaseResult> => {
      try {
        return await collabs.shutdown({
          clock,
          logger,
          deadlineMs: clock.nowMs() + options.shutdownTimeoutMs,
          stopHooks: options.stopHooks,
        })
      } finally {
        signalHandler?.unregister()
      }
    }

    return {
      stop: () => {
        stopping ??= runStop()
        return stopping
      },
    }
  }

  const runner: Runner = {
    setupProcessHandlers() {
      if (signalHandler) return runner

      signalHandler = collabs.setupProcessHandlers({
        logger,
        stop: () => handle?.stop() ?? notRunning(logger),
      })

      return runner
    },

    async start() {
      if (state !== "idle") throw LifecycleError.alreadyStarted()
      state = "starting"

      const started = createHandle()
      handle = started

      const result = await collabs.startup({
        clock,
        logger,
        deadlineMs: clock.nowMs() + options.startupTimeoutMs,
        startHooks: options.startHooks,
      })

      if (!result.ok) {
        await started.stop()
        handle = undefined
        state = "idle"

        throw LifecycleError.startupFailed(result)
      }

      state = "started"

      return started
    },
  }

  return runner
}

function notRunning(logger: Logger): Promise<PhaseResult> {
  logger.warn("Stop called but runner is not running")

  return Promise.resolve({ ok: true, failures: [], timedOut: false })
}
