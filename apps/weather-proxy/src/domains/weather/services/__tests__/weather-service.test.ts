import {
  type BytesCache,
  CacheAsideReadThrough,
  CodecDataCache,
  MemoryBytesCache,
} from "@nimbus/cache"
import { FakeClock } from "@nimbus/clock"
import type { Logger } from "@nimbus/logger"
import { mock } from "vitest-mock-extended"
import { createJsonCodec } from "../../../../lib/json-codec"
import { TEST_EPOCH_MS } from "../../../../tests/test-harness"
import { WeatherError } from "../../model/weather.errors"
import type { WeatherPayload } from "../../model/weather.model"
import type { WeatherProvider } from "../weather-provider"
import { WeatherService } from "../weather-service"

const TWELVE_HOURS_MS = 43_200_000

describe("WeatherService", () => {
  let clock: FakeClock
  let bytesCache: MemoryBytesCache
  let provider: ReturnType<typeof mock<WeatherProvider>>
  let logger: ReturnType<typeof mock<Logger>>

  beforeEach(() => {
    clock = new FakeClock(TEST_EPOCH_MS)
    bytesCache = new MemoryBytesCache({ clock }, { maxEntries: 100 })
    provider = mock<WeatherProvider>()
    logger = mock<Logger>()
  })

  function createService(cache: BytesCache = bytesCache): WeatherService {
    const readThrough = new CacheAsideReadThrough<WeatherPayload>(
      { cache: new CodecDataCache(cache, createJsonCodec()), clock, logger },
      { ttl: { kind: "seconds", seconds: 43_200 }, readTimeoutMs: 1_000, writeTimeoutMs: 1_000 },
    )

    return new WeatherService({ readThrough, provider, logger })
  }

  async function storedText(key: string): Promise<string | undefined> {
    const res = await bytesCache.get(key)

    return res.kind === "hit" ? new TextDecoder().decode(res.value) : undefined
  }

  describe("cache miss", () => {
    it("fetches from upstream and caches the serialized payload", async () => {
      provider.fetchCity.mockResolvedValue({ temp: 72 })

      const result = await createService().fetchWeather("Boston")

      expect(result).toStrictEqual({ source: "upstream", payload: { temp: 72 } })
      expect(provider.fetchCity).toHaveBeenCalledExactlyOnceWith("Boston")
      expect(await storedText("weather:boston")).toBe('{"temp":72}')
      expect(logger.info).toHaveBeenCalledWith("Serving from upstream", {
        city: "Boston",
        key: "weather:boston",
      })
    })

    it("writes with a 12 hour TTL", async () => {
      const set = vi.spyOn(bytesCache, "set")
      provider.fetchCity.mockResolvedValue({ temp: 72 })

      await createService().fetchWeather("Boston")

      expect(set).toHaveBeenCalledExactlyOnceWith("weather:boston", expect.any(Uint8Array), {
        ttl: { kind: "seconds", seconds: 43_200 },
      })
    })

    it("uses the empty city as-is", async () => {
      provider.fetchCity.mockResolvedValue(null)

      const result = await createService().fetchWeather("")

      expect(result).toStrictEqual({ source: "upstream", payload: null })
      expect(provider.fetchCity).toHaveBeenCalledExactlyOnceWith("")
      expect(await storedText("weather:")).toBe("null")
    })
  })

  describe("cache hit", () => {
    it("serves a second lookup within the TTL without calling upstream", async () => {
      provider.fetchCity.mockResolvedValue({ temp: 72 })
      const service = createService()

      await service.fetchWeather("Boston")
      clock.advance(TWELVE_HOURS_MS - 1)
      const second = await service.fetchWeather("BOSTON")

      expect(second).toStrictEqual({ source: "cache", payload: { temp: 72 } })
      expect(provider.fetchCity).toHaveBeenCalledOnce()
      expect(logger.info).toHaveBeenCalledWith("Serving from cache", {
        city: "BOSTON",
        key: "weather:boston",
      })
    })

    it("calls upstream again once the TTL has elapsed", async () => {
      provider.fetchCity.mockResolvedValueOnce({ temp: 72 }).mockResolvedValueOnce({ temp: 65 })
      const service = createService()

      await service.fetchWeather("Boston")
      clock.advance(TWELVE_HOURS_MS)
      const later = await service.fetchWeather("Boston")

      expect(later).toStrictEqual({ source: "upstream", payload: { temp: 65 } })
      expect(provider.fetchCity).toHaveBeenCalledTimes(2)
      expect(await storedText("weather:boston")).toBe('{"temp":65}')
    })
  })

  describe("upstream failures", () => {
    it("propagates a rejection with its status and writes nothing", async () => {
      const rejected = WeatherError.rejected("Atlantis", 404)
      provider.fetchCity.mockRejectedValue(rejected)

      await expect(createService().fetchWeather("Atlantis")).rejects.toBe(rejected)

      expect(rejected.context.status).toBe(404)
      expect(bytesCache.size()).toBe(0)
    })

    it("propagates an unreachable upstream and writes nothing", async () => {
      provider.fetchCity.mockRejectedValue(WeatherError.unreachable("Boston", new Error("refused")))

      await expect(createService().fetchWeather("Boston")).rejects.toMatchObject({
        code: "upstream_unreachable",
      })
      expect(bytesCache.size()).toBe(0)
    })
  })

  describe("degraded cache", () => {
    it("returns the fresh payload when the cache write fails", async () => {
      const failing = mock<BytesCache>()
      failing.get.mockResolvedValue({ kind: "miss" })
      failing.set.mockRejectedValue(new Error("READONLY"))
      provider.fetchCity.mockResolvedValue({ temp: 72 })

      const result = await createService(failing).fetchWeather("Boston")

      expect(result).toStrictEqual({ source: "upstream", payload: { temp: 72 } })
      expect(logger.warn).toHaveBeenCalledWith("Cache write failed", {
        key: "weather:boston",
        err: expect.objectContaining({ code: "cache_unavailable" }),
      })
    })

    it("treats a corrupt entry as a miss and rewrites it", async () => {
      await bytesCache.set("weather:boston", new TextEncoder().encode("{not json"))
      provider.fetchCity.mockResolvedValue({ temp: 72 })

      const result = await createService().fetchWeather("Boston")

      expect(result).toStrictEqual({ source: "upstream", payload: { temp: 72 } })
      expect(provider.fetchCity).toHaveBeenCalledOnce()
      expect(await storedText("weather:boston")).toBe('{"temp":72}')
      expect(logger.warn).toHaveBeenCalledWith("Cache entry is corrupt, treating as miss", {
        key: "weather:boston",
        err: expect.objectContaining({ code: "cache_corrupt" }),
      })
    })

    it("treats a failing cache read as a miss", async () => {
      const failing = mock<BytesCache>()
      failing.get.mockRejectedValue(new Error("ECONNRESET"))
      failing.set.mockResolvedValue(undefined)
      provider.fetchCity.mockResolvedValue({ temp: 72 })

      const result = await createService(failing).fetchWeather("Boston")

      expect(result.source).toBe("upstream")
      expect(failing.set).toHaveBeenCalledOnce()
    })

    it("treats a cache read that outlives its timeout as a miss", async () => {
      const hanging = mock<BytesCache>()
      hanging.get.mockReturnValue(new Promise(() => {}))
      hanging.set.mockResolvedValue(undefined)
      provider.fetchCity.mockResolvedValue({ temp: 72 })

      const pending = createService(hanging).fetchWeather("Boston")

      await vi.waitFor(() => expect(clock.pendingSleeps()).toBe(1))
      clock.advance(1_000)

      expect(await pending).toStrictEqual({ source: "upstream", payload: { temp: 72 } })
      expect(logger.warn).toHaveBeenCalledWith("Cache read timed out, treating as miss", {
        key: "weather:boston",
        err: expect.objectContaining({ code: "cache_unavailable" }),
      })
    })
  })
})
