import type { AddressInfo } from "node:net"
import { serve } from "@hono/node-server"
import type { Logger } from "@nimbus/logger"
import type { Application } from "../server/app"
import type { ResolvedServerOptions } from "../server/server-options"
import type { Closeable } from "./shutdown"

export interface ListeningServer extends Closeable {
  once(event: "error", listener: (err: Error) => void): unknown
  off(event: "error", listener: (err: Error) => void): unknown
}

export type ServeFn = (
  options: Parameters<typeof serve>[0],
  onListening: (info: AddressInfo) => void,
) => ListeningServer

/**
 * Resolves once the socket is bound. A bind failure (e.g. `EADDRINUSE`)
 * rejects instead of surfacing as an unhandled `error` event.
 */
export function listen(
  app: Application,
  options: ResolvedServerOptions,
  logger: Logger,
  serveFn: ServeFn = serve,
): Promise<Closeable> {
  return new Promise((resolve, reject) => {
    const server = serveFn(
      { fetch: app.fetch, port: options.port, hostname: options.host },
      (info) => {
        server.off("error", reject)
        logger.info(`Server listening on http://${options.host}:${info.port}`)
        resolve(server)
      },
    )

    server.once("error", reject)
  })
}

export type ListenFn = typeof listen
