import { mkdir } from "node:fs/promises"
import type { LifecycleHook } from "@murmur/lifecycle"
import type { AppContext } from "../create-context"

export function createStartHooks(context: AppContext): LifecycleHook[] {
  const { paths } = context.config
  const { logger } = context.services.core
  const { scheduler, runner, scanner, commands } = context.services.domains.transcription

  return [
    {
      name: "start:directories",
      fn: async () => {
        await Promise.all(
          [paths.tempDir, paths.modelCacheDir, paths.sessionDir].map((dir) => mkdir(dir, { recursive: true })),
        )
      },
    },
    {
      name: "start:telegram",
      fn: async () => {
        await context.infra.telegram.connect()
      },
    },
    {
      name: "start:subscriptions",
      fn: async () => {
        await commands.loadSubscriptions()
      },
    },
    {
      name: "start:scheduler",
      fn: async () => {
        scheduler.start()
      },
    },
    {
      name: "start:commands",
      fn: async () => {
        commands.listen()
      },
    },
    {
      name: "start:resume-scan",
      fn: async () => {
        runner.spawn("startup_scan", async (signal) => {
          const summary = await scanner.scan(signal)
          logger.info("Startup scan done", { ...summary })
        })
      },
    },
  ]
}

export type CreateStartHooksFn = typeof createStartHooks
