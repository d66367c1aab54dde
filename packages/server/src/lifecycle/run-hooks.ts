import { type Clock, type UnixMs, withTimeout } from "@nimbus/clock"
import type { Logger } from "@nimbus/logger"
import type { HookFailure, LifecycleHook } from "./lifecycle-hook"

export type HookPhase = "startup" | "shutdown"

export type RunHooksContext = {
  phase: HookPhase
  clock: Clock
  logger: Logger
  deadlineMs: UnixMs
}

export type RunHooksPolicy = {
  /** If true, stop after first failure. (Typical for startup) */
  failFast?: boolean
}

export type RunHooksResult = { failures: HookFailure[]; timedOut: boolean }

/**
 * Runs hooks in order, each bounded by the time left until `deadlineMs`.
 * A hook still running at the deadline is abandoned (its signal aborts) and
 * the remaining hooks are skipped.
 */
export async function runHooks(
  ctx: RunHooksContext,
  hooks: LifecycleHook[],
  policy: RunHooksPolicy = {},
): Promise<RunHooksResult> {
  const failures: HookFailure[] = []

  for (const hook of hooks) {
    const attempt = await runOneHook(ctx, hook)

    if (attempt.failure) {
      failures.push(attempt.failure)
      if (policy.failFast) return { failures, timedOut: attempt.timedOut }
    }

    if (attempt.timedOut) return { failures, timedOut: true }
  }

  return { failures, timedOut: false }
}

async function runOneHook(
  ctx: RunHooksContext,
  hook: LifecycleHook,
): Promise<{ failure?: HookFailure; timedOut: boolean }> {
  const msLeft = Math.max(0, ctx.deadlineMs - ctx.clock.nowMs())
  const phase = capitalize(ctx.phase)

  if (msLeft <= 0) {
    ctx.logger.warn(`Skipping remaining ${ctx.phase} hooks due to timeout`)
    return { timedOut: true }
  }

  const outcome = await withTimeout(ctx.clock, msLeft, (signal) =>
    hook.fn({ signal, timeRemainingMs: msLeft }),
  )

  if (outcome.kind === "completed") {
    ctx.logger.info(`Executed ${ctx.phase} hook: ${hook.name}`)
    return { timedOut: false }
  }

  if (outcome.kind === "timed_out") {
    ctx.logger.warn(`${phase} deadline exceeded during hook: ${hook.name}`, {
      timeoutMs: outcome.timeoutMs,
    })
    return {
      failure: { hook: hook.name, error: new Error(`Hook "${hook.name}" timed out`) },
      timedOut: true,
    }
  }

  ctx.logger.error(`${phase} hook failed: ${hook.name}`, { err: outcome.error })

  return { failure: { hook: hook.name, error: outcome.error }, timedOut: false }
}

function capitalize(s: string): string {
  return s.length ? `${s.charAt(0).toUpperCase()}${s.slice(1)}` : s
}
