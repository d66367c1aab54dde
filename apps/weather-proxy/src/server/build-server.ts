import type { AppError } from "@nimbus/errors"
import {
  type Application,
  createServer,
  type ErrorStatusCode,
  isErrorStatusCode,
  type LifecycleHook,
  type ReadinessCheck,
  type Server,
} from "@nimbus/server"
import type { AppContext } from "../app/create-context"
import { CACHE_STATUS_HEADER } from "../domains/weather"

export type BuiltServer = {
  app: Application
  server: Server
  startHooks: LifecycleHook[]
  stopHooks: LifecycleHook[]
}

/** Upstream status when it can carry an error body, else 502. */
export function upstreamStatus(err: AppError): ErrorStatusCode {
  const status = err.context.status

  return typeof status === "number" && isErrorStatusCode(status) ? status : 502
}

export function buildServer(ctx: AppContext): BuiltServer {
  const startHooks = ctx.createStartHooks(ctx)
  const stopHooks = ctx.createStopHooks(ctx)

  const server = createServer(
    {
      clock: ctx.services.core.clock,
      logger: ctx.services.core.logger,
    },
    {
      host: ctx.config.server.host,
      port: ctx.config.server.port,
      startupTimeoutMs: ctx.config.server.startupTimeoutMs,
      shutdownTimeoutMs: ctx.config.server.shutdownTimeoutMs,

      errorMappings: {
        mappings: {
          upstream_unreachable: { status: 500, message: "Failed to fetch weather data" },
          upstream_rejected: { status: upstreamStatus, message: "Invalid city or API error" },
          upstream_malformed: { status: 500, message: "Failed to parse weather data" },
        },
      },

      requestId: {
        enabled: true,
        header: ctx.config.requestId.header,
      },

      requestLogging: ctx.config.requestLogging.enabled
        ? {
            enabled: true,
            level: ctx.config.requestLogging.level,
            responseHeaderFields: { cache: CACHE_STATUS_HEADER },
          }
        : { enabled: false },

      health: {
        enabled: true,
        readinessChecks: createReadinessChecks(ctx),
      },

      routes: (app: Application): void => {
        ctx.registerRoutes(app, ctx.services)
      },

      startHooks,
      stopHooks,
    },
  )

  return {
    app: server.app,
    server,
    startHooks,
    stopHooks,
  }
}

function createReadinessChecks(ctx: AppContext): ReadinessCheck[] {
  const { redisClient } = ctx.services.infra

  if (!redisClient) return []

  return [
    {
      name: "redis",
      timeoutMs: ctx.config.cache.readTimeoutMs,
      fn: async () => {
        await redisClient.ping()
        return true
      },
    },
  ]
}
