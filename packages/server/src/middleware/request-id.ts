import { randomUUID } from "node:crypto"
import type { Context } from "hono"
import type { Middleware } from "../server/app"
import type { EnabledRequestIdConfig } from "../server/server-options"
import { isNonEmptyString } from "./utils/is-non-empty-string"
import { setHeaderIfMissing } from "./utils/set-header-if-missing"

function resolveRequestId(c: Context, header: string): string {
  const existing = c.get("requestId")

  if (isNonEmptyString(existing)) return existing

  const fromHeader = c.req.header(header)

  return isNonEmptyString(fromHeader) ? fromHeader : randomUUID()
}

/**
 * Resolves the request ID (one already on the context, then the incoming
 * header, then a random UUID), stores it as `requestId` on the context and
 * echoes it on the response.
 */
export function requestIdMiddleware(config: Required<EnabledRequestIdConfig>): Middleware {
  return async (c, next) => {
    const headerName = config.header.toLowerCase()
    const requestId = resolveRequestId(c, config.header)

    c.set("requestId", requestId)

    await next()

    setHeaderIfMissing(c.res.headers, headerName, requestId)
  }
}
