import { isAppError } from "@nimbus/errors"
import { WeatherError } from "../weather.errors"

describe("WeatherError", () => {
  it("unreachable keeps the network error as cause", () => {
    const cause = new TypeError("fetch failed")

    const err = WeatherError.unreachable("Boston", cause)

    expect(isAppError(err)).toBe(true)
    expect(err.code).toBe("upstream_unreachable")
    expect(err.context).toStrictEqual({ city: "Boston" })
    expect(err.cause).toBe(cause)
    expect(err.isRetryable).toBe(true)
  })

  it("timedOut is an unreachable upstream with the timeout in context", () => {
    const err = WeatherError.timedOut("Boston", 10_000)

    expect(err.code).toBe("upstream_unreachable")
    expect(err.message).toBe('Weather provider did not answer within 10000ms for "Boston"')
    expect(err.context).toStrictEqual({ city: "Boston", timeoutMs: 10_000 })
  })

  it("rejected carries the upstream status", () => {
    const err = WeatherError.rejected("Atlantis", 404)

    expect(err.code).toBe("upstream_rejected")
    expect(err.message).toBe('Weather provider answered 404 for "Atlantis"')
    expect(err.context).toStrictEqual({ city: "Atlantis", status: 404 })
    expect(err.isRetryable).toBe(false)
  })

  it("rejected with a 5xx is retryable", () => {
    expect(WeatherError.rejected("Boston", 503).isRetryable).toBe(true)
  })

  it("malformed is not retryable", () => {
    const err = WeatherError.malformed("Boston", new SyntaxError("Unexpected token"))

    expect(err.code).toBe("upstream_malformed")
    expect(err.isRetryable).toBe(false)
  })
})
