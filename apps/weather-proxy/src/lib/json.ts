export type JsonPrimitive = null | boolean | number | string

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue }

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true

  switch (typeof value) {
    case "boolean":
    case "string":
      return true
    case "number":
      return Number.isFinite(value)
    case "object":
      return Array.isArray(value)
        ? value.every(isJsonValue)
        : Object.values(value).every(isJsonValue)
    default:
      return false
  }
}

/**
 * @throws {SyntaxError} when `text` is not a JSON document
 */
export function parseJson(text: string): JsonValue {
  const parsed: unknown = JSON.parse(text)

  if (!isJsonValue(parsed)) {
    throw new SyntaxError("Parsed value is not a JSON value")
  }

  return parsed
}
