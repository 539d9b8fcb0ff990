import { createRunner } from "@murmur/lifecycle"
import { createAppContext } from "./app/create-context"

/** Room for the hooks around the job drain. */
const SHUTDOWN_MARGIN_MS = 30_000

async function main(): Promise<void> {
  const ctx = await createAppContext()
  const { logger, clock } = ctx.services.core

  const runner = createRunner(
    { clock, logger },
    {
      startHooks: ctx.createStartHooks(ctx),
      stopHooks: ctx.createStopHooks(ctx),
      startupTimeoutMs: ctx.config.lifecycle.startupTimeoutMs,
      shutdownTimeoutMs: ctx.config.lifecycle.stopGracePeriodMs + SHUTDOWN_MARGIN_MS,
    },
  )

  await runner.setupProcessHandlers().start()

  logger.info("Waiting for /tr, /ts and /transcription commands", {
    model: ctx.config.transcription.defaultModel,
    language: ctx.config.transcription.defaultLanguage,
  })
}

main().catch((err: unknown) => {
  console.error(err)
  process.exitCode = 1
})
