export { LifecycleError, type LifecycleErrorCode } from "./core/lifecycle-error"
export { type RunHooksContext, type RunHooksPolicy, runHooks } from "./core/run-hooks"
export {
  createRunner,
  type Runner,
  type RunnerCollabs,
  type RunnerDeps,
  type RunnerHandle,
  type RunnerOptions,
} from "./core/runner"
export { type ShutdownContext, type ShutdownFn, shutdown } from "./core/shutdown"
export {
  type SetupProcessHandlersFn,
  type SignalHandler,
  type SignalHandlerContext,
  setupProcessHandlers,
} from "./core/signals"
export { type StartupContext, type StartupFn, startup } from "./core/startup"
export type {
  HookFailure,
  HookPhase,
  LifecycleHook,
  LifecycleHookContext,
  PhaseResult,
} from "./ports/lifecycle-hook"
