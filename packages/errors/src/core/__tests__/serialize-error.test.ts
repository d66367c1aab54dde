import { BaseError, serializeError } from "../base-error"

describe("serializeError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2024-01-15T10:30:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it("serializes BaseError fields", () => {
    const err = new BaseError("rejected", {
      code: "upstream_rejected",
      context: { status: 404 },
      isOperational: true,
    })

    expect(serializeError(err)).toEqual({
      name: "BaseError",
      code: "upstream_rejected",
      message: "rejected",
      context: { status: 404 },
      isOperational: true,
      timestamp: "2024-01-15T10:30:00.000Z",
    })
  })

  it("includes the stack only when asked", () => {
    const err = new BaseError("test", { code: "test" })

    expect(serializeError(err).stack).toBeUndefined()
    expect(serializeError(err, { includeStack: true }).stack).toContain("BaseError")
  })

  it("serializes plain errors as unknown and non-operational", () => {
    expect(serializeError(new TypeError("fetch failed"))).toEqual({
      name: "TypeError",
      code: "unknown",
      message: "fetch failed",
      context: {},
      isOperational: false,
      timestamp: "2024-01-15T10:30:00.000Z",
    })
  })

  it("serializes the cause chain recursively", () => {
    const root = new Error("ECONNREFUSED")
    const middle = new BaseError("redis down", { code: "cache_unavailable", cause: root })
    const outer = new BaseError("lookup failed", { code: "lookup_failed", cause: middle })

    const serialized = serializeError(outer)

    expect(serialized.cause?.code).toBe("cache_unavailable")
    expect(serialized.cause?.cause?.message).toBe("ECONNREFUSED")
    expect(serialized.cause?.cause?.cause).toBeUndefined()
  })

  it("wraps non-error values", () => {
    expect(serializeError("plain string")).toMatchObject({
      name: "NonErrorThrown",
      message: "plain string",
      context: { value: "plain string" },
    })
    expect(serializeError({ reason: 1 })).toMatchObject({
      message: "Unknown error",
      context: { value: { reason: 1 } },
    })
  })
})
