import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import type { ConfigSource } from "../source"

export type ConfigSourceHarness = {
  name: string
  setup: (cwd: string) => Promise<void>
  make: (cwd: string) => ConfigSource
  expectedValue: () => Record<string, string | undefined>
}

export function describeConfigSourceContract(h: ConfigSourceHarness) {
  describe(`${h.name} (ConfigSource contract)`, () => {
    let cwd: string
    let source: ConfigSource

    beforeEach(async () => {
      cwd = await fs.mkdtemp(path.join(os.tmpdir(), "config-source-"))
      await h.setup(cwd)
      source = h.make(cwd)
    })

    afterEach(async () => {
      await fs.rm(cwd, { recursive: true, force: true })
    })

    it("has a non-empty name", () => {
      expect(source.name.length).toBeGreaterThan(0)
    })

    it("load() resolves to the expected plain object", async () => {
      const result = await source.load()

      expect(Object.getPrototypeOf(result)).toBe(Object.prototype)
      expect(result).toEqual(h.expectedValue())
    })

    it("load() is idempotent and hands out fresh objects", async () => {
      const a = await source.load()
      a.INJECTED = "mutated"

      const b = await source.load()

      expect(b).toEqual(h.expectedValue())
    })
  })
}
