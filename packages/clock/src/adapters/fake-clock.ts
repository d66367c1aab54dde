import type { Clock } from "../ports/clock"
import type { Milliseconds, UnixMs } from "../ports/time"

type PendingSleep = {
  wakeAtMs: UnixMs
  wake: () => void
}

/**
 * Manually driven clock for tests.
 *
 * Time only moves through `advance()` and `set()`. Sleepers wake once the
 * clock reaches their deadline, so timeouts built on `sleep()` are
 * deterministic.
 */
export class FakeClock implements Clock {
  private time: UnixMs
  private pending: PendingSleep[] = []

  constructor(start: UnixMs = 0) {
    this.time = start
  }

  now(): Date {
    return new Date(this.time)
  }

  nowMs(): UnixMs {
    return this.time
  }

  advance(ms: Milliseconds): void {
    this.set(this.time + ms)
  }

  set(ms: UnixMs): void {
    this.time = ms
    this.wakeDue()
  }

  /** Number of sleepers that have not woken yet. */
  pendingSleeps(): number {
    return this.pending.length
  }

  sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void> {
    if (ms <= 0 || signal?.aborted) return Promise.resolve()

    return new Promise((resolve) => {
      const entry: PendingSleep = {
        wakeAtMs: this.time + ms,
        wake: () => {
          signal?.removeEventListener("abort", onAbort)
          resolve()
        },
      }

      const onAbort = () => {
        this.pending = this.pending.filter((p) => p !== entry)
        resolve()
      }

      signal?.addEventListener("abort", onAbort, { once: true })
      this.pending.push(entry)
    })
  }

  private wakeDue(): void {
    const due = this.pending.filter((p) => p.wakeAtMs <= this.time)
    if (due.length === 0) return

    this.pending = this.pending.filter((p) => p.wakeAtMs > this.time)

    for (const p of due) p.wake()
  }
}
