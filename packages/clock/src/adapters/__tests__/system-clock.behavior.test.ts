import { SystemClock } from "../system-clock"

describe("SystemClock behavior", () => {
  it("nowMs() tracks Date.now()", () => {
    const clock = new SystemClock()
    const before = Date.now()
    const now = clock.nowMs()

    expect(now).toBeGreaterThanOrEqual(before)
    expect(now - before).toBeLessThan(50)
  })

  describe("sleep", () => {
    it("resolves after the delay elapses", async () => {
      const clock = new SystemClock()
      const start = Date.now()

      await clock.sleep(30)

      expect(Date.now() - start).toBeGreaterThanOrEqual(25)
    })

    it("resolves early and clears its timer when aborted", async () => {
      const clearTimeoutSpy = vi.spyOn(globalThis, "clearTimeout")
      const clock = new SystemClock()
      const ac = new AbortController()
      const start = Date.now()

      const sleeping = clock.sleep(5_000, ac.signal)
      ac.abort()
      await sleeping

      expect(Date.now() - start).toBeLessThan(500)
      expect(clearTimeoutSpy).toHaveBeenCalled()
    })

    it("detaches its abort listener after a normal wake-up", async () => {
      const clock = new SystemClock()
      const ac = new AbortController()
      const removeSpy = vi.spyOn(ac.signal, "removeEventListener")

      await clock.sleep(5, ac.signal)

      expect(removeSpy).toHaveBeenCalledWith("abort", expect.any(Function))
    })
  })
})
