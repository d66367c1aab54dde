import type { Logger } from "@nimbus/logger"
import type { Middleware } from "../server/app"
import { isNonEmptyString } from "./utils/is-non-empty-string"

/** Binds a per-request child logger, tagged with the request ID when there is one. */
export function requestLoggerMiddleware(baseLogger: Logger): Middleware {
  return async (c, next) => {
    const requestId = c.get("requestId")

    c.set("logger", baseLogger.child(isNonEmptyString(requestId) ? { requestId } : {}))

    await next()
  }
}
