import type { ResolvedServerOptions, ServerDependencies } from "../server/server-options"
import type { LifecycleHook } from "./lifecycle-hook"
import type { Closeable, ShutdownFn, StopResult } from "./shutdown"

export interface ServerHandle {
  stop(): Promise<StopResult>
  address: { host: string; port: number }
}

export type OnStopFn = () => void
export type SetReadyFn = (value: boolean) => void

export interface RunningServerContext {
  server: Closeable

  deps: ServerDependencies
  options: ResolvedServerOptions

  setReady: SetReadyFn

  onStop: OnStopFn
  shutdown: ShutdownFn
  stopHooks: LifecycleHook[]
}

/**
 * Returns a handle whose `stop()` runs shutdown once; later calls share the
 * first result.
 */
export function createStopper(ctx: RunningServerContext): ServerHandle {
  let stopping: Promise<StopResult> | undefined

  return {
    stop: () => {
      if (!stopping) {
        stopping = runShutdown(ctx)
      }

      return stopping
    },
    address: {
      host: ctx.options.host,
      port: ctx.options.port,
    },
  }
}

export type CreateStopperFn = typeof createStopper

async function runShutdown(ctx: RunningServerContext): Promise<StopResult> {
  ctx.setReady(false)

  try {
    return await ctx.shutdown({
      server: ctx.server,
      clock: ctx.deps.clock,
      logger: ctx.deps.logger,
      timeoutMs: ctx.options.shutdownTimeoutMs,
      stopHooks: ctx.stopHooks,
    })
  } finally {
    ctx.onStop()
  }
}
