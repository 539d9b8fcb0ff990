import { SystemClock } from "@murmur/clock"
import { createPinoLogger, type Logger } from "@murmur/logger"
import type { AppConfig } from "../config"

export type CoreServices = {
  logger: Logger
  clock: SystemClock
}

export function createCoreServices(config: AppConfig): CoreServices {
  const clock = new SystemClock()

  const logger = createPinoLogger(
    {},
    {
      level: config.logging.level,
      prettify: config.logging.prettify,
    },
    { service: config.logging.serviceName, env: config.app.env },
  )

  return { clock, logger }
}
