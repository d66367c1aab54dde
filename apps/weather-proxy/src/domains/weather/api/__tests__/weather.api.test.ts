import type { BytesCache } from "@nimbus/cache"
import type { Logger } from "@nimbus/logger"
import type { Application } from "@nimbus/server"
import { mock } from "vitest-mock-extended"
import {
  createFetchMock,
  type FetchMock,
  refuseConnection,
  respondWith,
  respondWithJson,
} from "../../../../tests/stub-fetch"
import {
  createTestHarness,
  TEST_BASE_URL,
  type TestHarness,
} from "../../../../tests/test-harness"

const TWELVE_HOURS_MS = 43_200_000

describe("Weather API", () => {
  let harness: TestHarness
  let app: Application
  let fetch: FetchMock
  let bytesCache: BytesCache

  beforeEach(async () => {
    fetch = createFetchMock(respondWithJson({ temp: 72 }))
    harness = await createTestHarness({ fetch })
    app = harness.app
    bytesCache = harness.bytesCache
  })

  const getWeather = (city: string, init?: RequestInit) =>
    app.request(`/weather/${encodeURIComponent(city)}`, init)

  async function storedText(key: string): Promise<string | undefined> {
    const res = await bytesCache.get(key)

    return res.kind === "hit" ? new TextDecoder().decode(res.value) : undefined
  }

  describe("GET /weather/:city", () => {
    it("fetches a cold city from upstream and caches it", async () => {
      const res = await getWeather("Boston")

      expect(res.status).toBe(200)
      expect(await res.json()).toStrictEqual({ temp: 72 })
      expect(res.headers.get("x-cache")).toBe("MISS")
      expect(fetch).toHaveBeenCalledExactlyOnceWith(
        `${TEST_BASE_URL}/Boston?key=test-secret`,
        expect.objectContaining({ signal: expect.any(AbortSignal) }),
      )
      expect(await storedText("weather:boston")).toBe('{"temp":72}')
    })

    it("serves a pre-populated entry for any casing without calling upstream", async () => {
      await bytesCache.set("weather:boston", new TextEncoder().encode('{"temp":72}'))

      const res = await getWeather("BOSTON")

      expect(res.status).toBe(200)
      expect(await res.json()).toStrictEqual({ temp: 72 })
      expect(res.headers.get("x-cache")).toBe("HIT")
      expect(fetch).not.toHaveBeenCalled()
    })

    it("answers 500 when upstream is unreachable and writes nothing", async () => {
      fetch.mockImplementation(refuseConnection())
      const set = vi.spyOn(bytesCache, "set")

      const res = await getWeather("Boston")

      expect(res.status).toBe(500)
      expect(await res.json()).toStrictEqual({ error: "Failed to fetch weather data" })
      expect(set).not.toHaveBeenCalled()
    })

    it("passes the upstream status through when upstream rejects the city", async () => {
      fetch.mockImplementation(respondWith("Bad API Request: Invalid location parameter", 400))

      const res = await getWeather("Atlantis")

      expect(res.status).toBe(400)
      expect(await res.json()).toStrictEqual({ error: "Invalid city or API error" })
      expect(await storedText("weather:atlantis")).toBeUndefined()
    })

    it("passes a 401 from a bad API key through", async () => {
      fetch.mockImplementation(respondWith("No account found", 401))

      const res = await getWeather("Boston")

      expect(res.status).toBe(401)
      expect(await res.json()).toStrictEqual({ error: "Invalid city or API error" })
    })

    it.each([420, 499, 520, 522, 524])("passes an unregistered %i through", async (status) => {
      fetch.mockImplementation(respondWith("upstream trouble", status))

      const res = await getWeather("Boston")

      expect(res.status).toBe(status)
      expect(await res.json()).toStrictEqual({ error: "Invalid city or API error" })
    })

    it("answers 502 for an upstream status that cannot carry an error body", async () => {
      fetch.mockImplementation(async () => new Response(null, { status: 304 }))

      const res = await getWeather("Boston")

      expect(res.status).toBe(502)
      expect(await res.json()).toStrictEqual({ error: "Invalid city or API error" })
    })

    it("answers 500 when upstream sends a body that is not JSON", async () => {
      fetch.mockImplementation(respondWith("<html>oops</html>"))

      const res = await getWeather("Boston")

      expect(res.status).toBe(500)
      expect(await res.json()).toStrictEqual({ error: "Failed to parse weather data" })
      expect(await storedText("weather:boston")).toBeUndefined()
    })

    it("refetches after the 12 hour TTL", async () => {
      await getWeather("Boston")
      harness.clock.advance(TWELVE_HOURS_MS - 1)
      const cached = await getWeather("boston")
      harness.clock.advance(1)
      const refreshed = await getWeather("Boston")

      expect(cached.headers.get("x-cache")).toBe("HIT")
      expect(refreshed.headers.get("x-cache")).toBe("MISS")
      expect(fetch).toHaveBeenCalledTimes(2)
    })

    it("decodes a percent-encoded city before keying and forwarding it", async () => {
      await getWeather("New York")

      expect(fetch.mock.calls[0]?.[0]).toBe(`${TEST_BASE_URL}/New York?key=test-secret`)
      expect(await storedText("weather:new york")).toBe('{"temp":72}')
    })

    it("tags every response with a request ID", async () => {
      const res = await getWeather("Boston", { headers: { "x-request-id": "req-abc" } })

      expect(res.headers.get("x-request-id")).toBe("req-abc")
    })
  })

  describe("request logging", () => {
    it("records whether the cache answered", async () => {
      const logger = mock<Logger>()
      logger.child.mockReturnValue(logger)

      const logged = await createTestHarness({ fetch, logger })

      await logged.app.request("/weather/Boston")
      await logged.app.request("/weather/Boston")

      const completed = logger.info.mock.calls.filter(([message]) => message === "Request completed")

      expect(completed.map(([, meta]) => meta?.cache)).toStrictEqual(["MISS", "HIT"])
      expect(completed[0]?.[1]).toMatchObject({
        method: "GET",
        path: "/weather/Boston",
        route: "/weather/:city",
        status: 200,
      })
    })
  })

  describe("health", () => {
    it("answers liveness", async () => {
      const res = await app.request("/health")

      expect(res.status).toBe(200)
      expect(await res.json()).toStrictEqual({ ok: true })
      expect(res.headers.get("x-request-id")).toEqual(expect.any(String))
    })

    it("is not ready before the server has started", async () => {
      const res = await app.request("/ready")

      expect(res.status).toBe(503)
      expect(await res.json()).toStrictEqual({ ok: false, reason: "starting" })
    })
  })

  it("answers 404 for unknown routes", async () => {
    expect((await app.request("/weather")).status).toBe(404)
  })
})
