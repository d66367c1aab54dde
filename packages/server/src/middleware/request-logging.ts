import type { Logger, LogMeta } from "@nimbus/logger"
import { routePath } from "hono/route"
import type { Context, Middleware } from "../server/app"
import type { EnabledRequestLoggingConfig, PathString } from "../server/server-options"
import { isNonEmptyString } from "./utils/is-non-empty-string"

/**
 * One "Request completed" line per request, at `error` for 5xx and at the
 * configured level otherwise. Paths under `ignorePaths` are not logged.
 */
export function requestLoggingMiddleware(
  config: Required<EnabledRequestLoggingConfig>,
  baseLogger: Logger,
): Middleware {
  return async (c, next) => {
    if (isIgnored(c.req.path, config.ignorePaths)) return next()

    const startedAt = performance.now()

    try {
      await next()
    } finally {
      const meta = describeRequest(c, Math.round(performance.now() - startedAt), config)
      const logger = c.get("logger") ?? baseLogger
      const level = c.res.status >= 500 ? "error" : config.level

      logger[level]("Request completed", meta)
    }
  }
}

function describeRequest(
  c: Context,
  durationMs: number,
  config: Required<EnabledRequestLoggingConfig>,
): LogMeta {
  const path = c.req.path
  const method = c.req.method
  const matched = routePath(c)
  const route = isNonEmptyString(matched) ? matched : path
  const userAgent = c.req.header("user-agent")

  const meta: LogMeta = {
    requestId: c.get("requestId") ?? "unknown",
    method,
    path,
    route,
    op: `${method} ${route}`,
    status: c.res.status,
    durationMs,
    ...(userAgent !== undefined && { userAgent }),
  }

  for (const [field, header] of Object.entries(config.responseHeaderFields)) {
    const value = c.res.headers.get(header)
    if (value !== null) meta[field] = value
  }

  return meta
}

function isIgnored(path: string, ignorePaths: PathString[]): boolean {
  return ignorePaths.some((ignored) => path === ignored || path.startsWith(`${ignored}/`))
}
