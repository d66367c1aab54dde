import { type ErrorCode, isAppError } from "@nimbus/errors"
import type { Logger } from "@nimbus/logger"
import type { ErrorHandler as HonoErrorHandler } from "hono"
import { routePath } from "hono/route"
import type { ErrorStatusCode } from "../http/status-codes"
import { isNonEmptyString } from "../middleware/utils/is-non-empty-string"
import type { Context } from "../server/app"
import type { ResolvedServerOptions } from "../server/server-options"
import { createErrorFormatter } from "./error-response"

export type ErrorHandler = HonoErrorHandler

export function createErrorHandler(
  config: ResolvedServerOptions,
  baseLogger: Logger,
): ErrorHandler {
  const format = createErrorFormatter(config.errorMappings)

  return (err, c) => {
    const { status, code, body } = format(err)

    logFailure(c.get("logger") ?? baseLogger, err, describeFailure(c, status, code))

    // c.json only types registered status codes
    return Response.json(body, { status })
  }
}

export type CreateErrorHandlerFn = typeof createErrorHandler

type FailureLogMeta = {
  requestId: string
  method: string
  route: string
  op: string
  status: ErrorStatusCode
  code: ErrorCode
}

function describeFailure(c: Context, status: ErrorStatusCode, code: ErrorCode): FailureLogMeta {
  const matched = routePath(c)
  const route = isNonEmptyString(matched) ? matched : c.req.path
  const method = c.req.method

  return {
    requestId: c.get("requestId") ?? "unknown",
    method,
    route,
    op: `${method} ${route}`,
    status,
    code,
  }
}

/**
 * - 4xx: info, with the error itself only at debug
 * - 5xx from an operational error (a dependency down or slow): warn
 * - any other 5xx: error
 */
function logFailure(logger: Logger, err: unknown, meta: FailureLogMeta): void {
  if (meta.status < 500) {
    logger.info("Request failed", meta)
    logger.debug("Request failed details", { ...meta, err })
    return
  }

  if (isAppError(err) && err.isOperational) {
    logger.warn("Request failed", { ...meta, err })
    return
  }

  logger.error("Request failed", { ...meta, err })
}
