import { isNonEmptyString } from "../is-non-empty-string"

describe("isNonEmptyString", () => {
  it.each(["req-1", " padded ", "/weather/:city"])("accepts %j", (value) => {
    expect(isNonEmptyString(value)).toBe(true)
  })

  it.each(["", "   ", "\n\t", undefined, null, 0, false, {}, []])("rejects %j", (value) => {
    expect(isNonEmptyString(value)).toBe(false)
  })

  it("narrows unknown values to string", () => {
    const header: unknown = "abc"

    expect(isNonEmptyString(header) ? header.length : -1).toBe(3)
  })
})
