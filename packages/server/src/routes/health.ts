import { type Clock, type Milliseconds, withTimeout } from "@nimbus/clock"
import type { Application } from "../server/app"
import type { ReadinessCheck, ResolvedHealthConfig } from "../server/server-options"

const NO_CACHE_HEADERS = {
  "Cache-Control": "no-store, no-cache, must-revalidate",
} as const

export type HealthRouteDeps = {
  isReady: () => boolean
  clock: Clock
}

type CheckResult = { ok: true } | { ok: false; reason: string }

export function registerHealthRoutes(
  app: Application,
  config: ResolvedHealthConfig,
  deps: HealthRouteDeps,
): void {
  if (!config.enabled) return

  app.get(config.livenessPath, (c) => c.json({ ok: true }, { headers: NO_CACHE_HEADERS }))

  app.get(config.readinessPath, async (c) => {
    if (!deps.isReady()) {
      return c.json(
        { ok: false, reason: "starting" },
        { status: 503, headers: NO_CACHE_HEADERS },
      )
    }

    for (const check of config.readinessChecks) {
      const res = await runCheck(deps.clock, check, check.timeoutMs ?? config.checkTimeoutMs)

      if (!res.ok) {
        return c.json(
          { ok: false, reason: res.reason },
          { status: 503, headers: NO_CACHE_HEADERS },
        )
      }
    }

    return c.json({ ok: true }, { headers: NO_CACHE_HEADERS })
  })
}

async function runCheck(
  clock: Clock,
  check: ReadinessCheck,
  timeoutMs: Milliseconds,
): Promise<CheckResult> {
  const outcome = await withTimeout(clock, timeoutMs, (signal) => check.fn(signal))

  if (outcome.kind === "timed_out") return { ok: false, reason: `${check.name}:timeout` }
  if (outcome.kind === "failed") return { ok: false, reason: `${check.name}:error` }

  return outcome.value ? { ok: true } : { ok: false, reason: check.name }
}
