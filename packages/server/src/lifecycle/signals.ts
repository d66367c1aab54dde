import type { EventEmitter } from "node:events"
import type { Logger } from "@nimbus/logger"
import type { StopResult } from "./shutdown"

export interface SignalHandlerContext {
  logger: Logger
  stop?: () => Promise<StopResult>

  /**
   * Upper bound for the stop attempt after a fatal error before the process
   * is force-exited.
   * @default 10_000
   */
  fatalTimeoutMs?: number

  /** @default process.exit */
  exit?: (code: number) => void

  /** @default process */
  target?: ProcessEventTarget
}

export type ProcessEventTarget = Pick<EventEmitter, "on" | "off">

export interface SignalHandler {
  unregister: () => void
}

const SHUTDOWN_SIGNALS = ["SIGINT", "SIGTERM"] as const satisfies readonly NodeJS.Signals[]

/**
 * Registers process handlers:
 * - SIGINT/SIGTERM trigger one graceful stop
 * - `uncaughtException`/`unhandledRejection` log at fatal, attempt a stop
 *   bounded by `fatalTimeoutMs`, then exit with code 1
 */
export function setupProcessHandlers(ctx: SignalHandlerContext): SignalHandler {
  const fatalTimeoutMs = ctx.fatalTimeoutMs ?? 10_000
  const exit = ctx.exit ?? ((code: number) => process.exit(code))
  const target = ctx.target ?? process

  let stopping = false

  const onSignal = (signal: NodeJS.Signals) => {
    ctx.logger.info("Received signal", { signal })

    if (stopping) return
    stopping = true

    ctx.logger.warn("Shutdown triggered", { reason: signal })
    void runStop(ctx, signal)
  }

  const onFatal = (reason: string, err: unknown) => {
    if (stopping) {
      ctx.logger.fatal("Fatal error during shutdown", { reason, err })
      exit(1)
      return
    }

    stopping = true
    ctx.logger.fatal("Fatal error", { reason, err })

    void withForceExit(ctx.logger, fatalTimeoutMs, exit, () => runStop(ctx, reason)).then(
      () => exit(1),
    )
  }

  const signalListeners = SHUTDOWN_SIGNALS.map((signal) => {
    const listener = () => onSignal(signal)
    target.on(signal, listener)
    return [signal, listener] as const
  })

  const uncaughtHandler = (err: Error) => onFatal("uncaughtException", err)
  const rejectionHandler = (reason: unknown) => onFatal("unhandledRejection", reason)

  target.on("uncaughtException", uncaughtHandler)
  target.on("unhandledRejection", rejectionHandler)

  return {
    unregister: () => {
      for (const [signal, listener] of signalListeners) target.off(signal, listener)
      target.off("uncaughtException", uncaughtHandler)
      target.off("unhandledRejection", rejectionHandler)
    },
  }
}

export type SetupProcessHandlersFn = typeof setupProcessHandlers

async function runStop(ctx: SignalHandlerContext, reason: string): Promise<void> {
  if (!ctx.stop) {
    ctx.logger.warn("No stop handler registered", { reason })
    return
  }

  try {
    const result = await ctx.stop()

    if (!result.ok) {
      ctx.logger.error("Shutdown completed with issues", {
        reason,
        failureCount: result.failures.length,
        timedOut: result.timedOut,
      })
    }
  } catch (err) {
    ctx.logger.error("Shutdown failed", { reason, err })
  }
}

async function withForceExit(
  logger: Logger,
  ms: number,
  exit: (code: number) => void,
  fn: () => Promise<void>,
): Promise<void> {
  const timer = setTimeout(() => {
    logger.fatal("Forced exit after timeout", { timeoutMs: ms })
    exit(1)
  }, ms)

  timer.unref()

  try {
    await fn()
  } finally {
    clearTimeout(timer)
  }
}
