import { type Clock, SystemClock } from "@nimbus/clock"
import { createPinoLogger, type Logger } from "@nimbus/logger"
import type { AppConfig } from "../config"

export type CoreServices = {
  logger: Logger
  clock: Clock
}

export function createCoreServices(
  config: AppConfig,
  overrides: Partial<CoreServices> = {},
): CoreServices {
  const clock = overrides.clock ?? new SystemClock()

  const logger =
    overrides.logger ??
    createPinoLogger(
      {},
      { level: config.logging.level, prettify: config.logging.prettify },
      { service: config.logging.serviceName },
    )

  return { clock, logger }
}
