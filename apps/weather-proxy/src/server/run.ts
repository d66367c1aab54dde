import { createPinoLogger, type Logger } from "@nimbus/logger"
import { type AppContextOptions, createAppContext } from "../app/create-context"
import { buildServer } from "./build-server"

export type RunOptions = AppContextOptions & {
  /** @default process.exit */
  exit?: (code: number) => void
}

/**
 * Loads config, starts the server and installs signal handlers. Any start-up
 * failure (invalid config, Redis unreachable) is logged at fatal and exits
 * with code 1.
 */
export async function run(options: RunOptions = {}): Promise<void> {
  const exit = options.exit ?? ((code: number) => process.exit(code))

  let logger: Logger =
    options.core?.logger ?? createPinoLogger({}, { level: "info" }, { service: "weather-proxy" })

  try {
    const ctx = await createAppContext(options)
    logger = ctx.services.core.logger

    const { server } = buildServer(ctx)

    const running = await server.setupProcessHandlers().start()

    logger.info("Server started", {
      port: running.address.port,
      host: running.address.host,
      cacheStore: ctx.config.cache.store,
    })
  } catch (err) {
    logger.fatal("Startup failed", { err })
    exit(1)
  }
}
