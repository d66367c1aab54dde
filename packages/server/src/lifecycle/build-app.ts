import type { Clock } from "@nimbus/clock"
import type { ErrorHandler } from "../errors/create-error-handler"
import { registerHealthRoutes } from "../routes/health"
import type { Application, Middleware } from "../server/app"
import type { ResolvedServerOptions } from "../server/server-options"

export interface BuildAppContext {
  app: Application
  clock: Clock
  isReady: () => boolean
  errorHandler: ErrorHandler
  options: ResolvedServerOptions
  defaultMiddleware: Middleware[]
}

/**
 * Wires default middleware, health routes, routes and the error handler onto
 * `app`, in that order.
 */
export function buildApp(ctx: BuildAppContext): Application {
  const { app, options } = ctx

  applyMiddleware(app, ctx.defaultMiddleware)

  if (options.health.enabled) {
    registerHealthRoutes(app, options.health, { isReady: ctx.isReady, clock: ctx.clock })
  }

  options.routes(app)

  app.onError(ctx.errorHandler)

  return app
}

export type BuildAppFn = typeof buildApp

function applyMiddleware(app: Application, middleware: Middleware[]): void {
  for (const mw of middleware) app.use("*", mw)
}
