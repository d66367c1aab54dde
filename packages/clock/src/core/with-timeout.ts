import type { Sleeper } from "../ports/clock"
import type { Milliseconds } from "../ports/time"

export type TimeoutOutcome<T> =
  | { kind: "completed"; value: T }
  | { kind: "failed"; error: unknown }
  | { kind: "timed_out"; timeoutMs: Milliseconds }

/**
 * Runs `task` against a deadline measured on `sleeper`.
 *
 * The signal handed to `task` aborts once the outcome is decided, whichever
 * way it went. Rejections are captured as `failed`, including those that
 * arrive after the deadline has already passed.
 */
export async function withTimeout<T>(
  sleeper: Sleeper,
  timeoutMs: Milliseconds,
  task: (signal: AbortSignal) => Promise<T>,
): Promise<TimeoutOutcome<T>> {
  const controller = new AbortController()

  const completed = (value: T): TimeoutOutcome<T> => ({ kind: "completed", value })
  const failed = (error: unknown): TimeoutOutcome<T> => ({ kind: "failed", error })
  const timedOut = (): TimeoutOutcome<T> => ({ kind: "timed_out", timeoutMs })

  const settled = Promise.resolve()
    .then(() => task(controller.signal))
    .then(completed, failed)

  const expired = sleeper.sleep(timeoutMs, controller.signal).then(timedOut)

  try {
    return await Promise.race([settled, expired])
  } finally {
    controller.abort()
  }
}
