import type { Clock, Milliseconds } from "@nimbus/clock"
import type { Logger } from "@nimbus/logger"
import type { HookFailure, LifecycleHook } from "./lifecycle-hook"
import { runHooks } from "./run-hooks"

export type StartupContext = {
  clock: Clock
  logger: Logger

  /** Shared by every start hook; measured from the call. */
  timeoutMs: Milliseconds

  startHooks: LifecycleHook[]
}

export type StartSucceeded = { ok: true; durationMs: Milliseconds }
export type StartFailed = { ok: false; failures: HookFailure[]; timedOut: boolean }
export type StartResult = StartSucceeded | StartFailed

/** Runs start hooks in order and stops at the first one that fails. */
export async function startup(ctx: StartupContext): Promise<StartResult> {
  const startedAt = ctx.clock.nowMs()

  ctx.logger.debug(`Running ${ctx.startHooks.length} start hook(s)`, {
    timeoutMs: ctx.timeoutMs,
  })

  const { failures, timedOut } = await runHooks(
    {
      phase: "startup",
      clock: ctx.clock,
      logger: ctx.logger,
      deadlineMs: startedAt + ctx.timeoutMs,
    },
    ctx.startHooks,
    { failFast: true },
  )

  if (failures.length > 0 || timedOut) return { ok: false, failures, timedOut }

  const durationMs = ctx.clock.nowMs() - startedAt
  ctx.logger.debug("Start hooks completed", { durationMs })

  return { ok: true, durationMs }
}

export type StartupFn = typeof startup
