import { BaseError } from "@murmur/errors"
import type { PhaseResult } from "../ports/lifecycle-hook"

export type LifecycleErrorCode = "already_started" | "startup_failed"

export class LifecycleError extends BaseError<LifecycleErrorCode> {
  static alreadyStarted(): LifecycleError {
    return new LifecycleError("Runner already started", {
      code: "already_started",
      isOperational: false,
    })
  }

  static startupFailed(result: PhaseResult): LifecycleError {
    const first = result.failures[0]

    return new LifecycleError(
      result.timedOut && !first ? "Startup timed out" : `Startup hook failed: ${first?.hook}`,
      {
        code: "startup_failed",
        context: { hooks: result.failures.map((f) => f.hook), timedOut: result.timedOut },
        cause: first?.error,
      },
    )
  }
}
