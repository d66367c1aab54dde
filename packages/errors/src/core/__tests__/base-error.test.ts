import { BaseError } from "../base-error"

class QuotaError extends BaseError<"quota_exceeded"> {}

describe("BaseError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2024-01-15T10:30:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  describe("construction", () => {
    it("applies defaults for optional fields", () => {
      const err = new BaseError("Something went wrong", { code: "test_error" })

      expect(err.message).toBe("Something went wrong")
      expect(err.code).toBe("test_error")
      expect(err.context).toEqual({})
      expect(err.isRetryable).toBe(false)
      expect(err.isOperational).toBe(true)
      expect(err.timestamp).toEqual(new Date("2024-01-15T10:30:00.000Z"))
      expect(err.cause).toBeUndefined()
    })

    it("keeps the provided options", () => {
      const cause = new Error("socket hang up")
      const err = new BaseError("upstream failed", {
        code: "upstream_unreachable",
        context: { city: "boston" },
        cause,
        isRetryable: true,
        isOperational: false,
      })

      expect(err.context).toEqual({ city: "boston" })
      expect(err.cause).toBe(cause)
      expect(err.isRetryable).toBe(true)
      expect(err.isOperational).toBe(false)
    })

    it("freezes a copy of the context", () => {
      const context = { city: "boston" }
      const err = new BaseError("test", { code: "test", context })

      context.city = "paris"

      expect(Object.isFrozen(err.context)).toBe(true)
      expect(err.context).toEqual({ city: "boston" })
    })

    it("takes its name from the concrete class", () => {
      const err = new QuotaError("too many", { code: "quota_exceeded" })

      expect(err.name).toBe("QuotaError")
      expect(err).toBeInstanceOf(BaseError)
      expect(err).toBeInstanceOf(Error)
      expect(err.stack).toContain("QuotaError")
    })
  })

  describe("toJSON", () => {
    it("returns the serialized error", () => {
      const err = new BaseError("test error", { code: "test", context: { id: 123 } })

      expect(JSON.parse(JSON.stringify(err))).toEqual({
        name: "BaseError",
        code: "test",
        message: "test error",
        context: { id: 123 },
        isOperational: true,
        timestamp: "2024-01-15T10:30:00.000Z",
      })
    })
  })
})
