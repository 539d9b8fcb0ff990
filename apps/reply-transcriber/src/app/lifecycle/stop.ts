import type { LifecycleHook } from "@murmur/lifecycle"
import type { AppContext } from "../create-context"

export function createStopHooks(context: AppContext): LifecycleHook[] {
  const { lifecycle } = context.config
  const { logger } = context.services.core
  const { scheduler, runner, commands } = context.services.domains.transcription

  return [
    {
      name: "stop:commands",
      fn: async () => {
        commands.stopListening()
        runner.stopAccepting()
      },
    },
    {
      name: "stop:scheduler",
      fn: async () => {
        await scheduler.stop()
      },
    },
    {
      name: "stop:jobs",
      fn: async () => {
        const result = await runner.drain(lifecycle.stopGracePeriodMs)
        logger.info("Jobs drained", { ...result })
      },
    },
    {
      name: "stop:telegram",
      fn: async () => {
        await context.infra.telegram.disconnect()
      },
    },
  ]
}

export type CreateStopHooksFn = typeof createStopHooks
