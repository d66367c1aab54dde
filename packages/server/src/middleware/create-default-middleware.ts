import type { Logger } from "@nimbus/logger"
import type { Middleware } from "../server/app"
import type { ResolvedServerOptions } from "../server/server-options"
import { headerSuppressionMiddleware } from "./header-suppression"
import { requestIdMiddleware } from "./request-id"
import { requestLoggerMiddleware } from "./request-logger"
import { requestLoggingMiddleware } from "./request-logging"

/**
 * Order matters: the request ID must exist before the per-request logger
 * binds it, and that logger before the completion line is written.
 */
export function createDefaultMiddleware(
  options: ResolvedServerOptions,
  logger: Logger,
): Middleware[] {
  const { requestId, requestLogging } = options

  return [
    headerSuppressionMiddleware(),
    ...(requestId.enabled ? [requestIdMiddleware(requestId)] : []),
    requestLoggerMiddleware(logger),
    ...(requestLogging.enabled ? [requestLoggingMiddleware(requestLogging, logger)] : []),
  ]
}

export type CreateDefaultMiddlewareFn = typeof createDefaultMiddleware
