import type { Clock, Milliseconds } from "@nimbus/clock"
import type { Logger } from "@nimbus/logger"
import type { HookFailure, LifecycleHook } from "./lifecycle-hook"
import { runHooks } from "./run-hooks"

export interface Closeable {
  close: (callback?: (err?: Error | null) => void) => void
}

export type ShutdownContext = {
  server: Closeable
  clock: Clock
  logger: Logger

  /** Shared by the listener close and every stop hook. */
  timeoutMs: Milliseconds

  stopHooks: LifecycleHook[]
}

export type StopResult = {
  /** No failures and no timeout. */
  ok: boolean

  failures: HookFailure[]

  /** The listener close or some stop hooks were abandoned or skipped. */
  timedOut: boolean

  durationMs: Milliseconds
}

/**
 * Stops accepting connections, then runs every stop hook even when an
 * earlier one fails.
 */
export async function shutdown(ctx: ShutdownContext): Promise<StopResult> {
  const startedAt = ctx.clock.nowMs()

  ctx.logger.warn("Shutting down gracefully...", { timeoutMs: ctx.timeoutMs })

  const { failures, timedOut } = await runHooks(
    {
      phase: "shutdown",
      clock: ctx.clock,
      logger: ctx.logger,
      deadlineMs: startedAt + ctx.timeoutMs,
    },
    [closeListener(ctx.server), ...ctx.stopHooks],
    { failFast: false },
  )

  const durationMs = ctx.clock.nowMs() - startedAt
  ctx.logger.info("Shutdown complete", { durationMs })

  return { ok: failures.length === 0 && !timedOut, failures, timedOut, durationMs }
}

export type ShutdownFn = typeof shutdown

function isNotRunning(err: Error): boolean {
  return "code" in err && err.code === "ERR_SERVER_NOT_RUNNING"
}

function closeListener(server: Closeable): LifecycleHook {
  return {
    name: "server.close",
    fn: () =>
      new Promise<void>((resolve, reject) => {
        server.close((err) => {
          if (err && !isNotRunning(err)) reject(err)
          else resolve()
        })
      }),
  }
}
