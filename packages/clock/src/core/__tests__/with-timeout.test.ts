import { FakeClock } from "../../adapters/fake-clock"
import { withTimeout } from "../with-timeout"

describe("withTimeout", () => {
  it("returns the task value when it settles first", async () => {
    const clock = new FakeClock(0)

    const outcome = await withTimeout(clock, 1000, async () => "done")

    expect(outcome).toStrictEqual({ kind: "completed", value: "done" })
    expect(clock.pendingSleeps()).toBe(0)
  })

  it("captures rejections as failed", async () => {
    const clock = new FakeClock(0)
    const error = new Error("boom")

    const outcome = await withTimeout(clock, 1000, async () => {
      throw error
    })

    expect(outcome).toStrictEqual({ kind: "failed", error })
  })

  it("captures synchronous throws as failed", async () => {
    const clock = new FakeClock(0)
    const error = new Error("sync")

    const outcome = await withTimeout(clock, 1000, () => {
      throw error
    })

    expect(outcome).toStrictEqual({ kind: "failed", error })
  })

  it("times out when the clock passes the deadline first", async () => {
    const clock = new FakeClock(0)
    let seenSignal: AbortSignal | undefined

    const pending = withTimeout(clock, 250, (signal) => {
      seenSignal = signal
      return new Promise<string>(() => {})
    })

    await Promise.resolve()
    clock.advance(250)

    await expect(pending).resolves.toStrictEqual({ kind: "timed_out", timeoutMs: 250 })
    expect(seenSignal?.aborted).toBe(true)
  })

  it("aborts the task signal once the task completes", async () => {
    const clock = new FakeClock(0)
    let seenSignal: AbortSignal | undefined

    await withTimeout(clock, 1000, async (signal) => {
      seenSignal = signal
      return 1
    })

    expect(seenSignal?.aborted).toBe(true)
  })
})
