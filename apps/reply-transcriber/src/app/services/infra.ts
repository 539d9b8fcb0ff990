import { TelegramSession } from "../../domains/transcription/infra/telegram-session"
import { type RunCommandFn, runCommand } from "../../lib/run-command"
import type { AppConfig } from "../config"
import type { CoreServices } from "./core"

export type InfraClients = {
  telegram: TelegramSession
  runCommand: RunCommandFn
}

export async function createDefaultInfraClients(
  config: AppConfig,
  core: CoreServices,
): Promise<InfraClients> {
  const telegram = await TelegramSession.open(
    { logger: core.logger },
    {
      apiId: config.telegram.apiId,
      apiHash: config.telegram.apiHash,
      phone: config.telegram.phone,
      password: config.telegram.password,
      sessionDir: config.paths.sessionDir,
      sessionName: config.telegram.sessionName,
    },
  )

  return { telegram, runCommand }
}
