import type { Codec } from "@nimbus/cache"
import { type JsonValue, parseJson } from "./json"

const encoder = new TextEncoder()
const decoder = new TextDecoder("utf-8", { fatal: true })

/** Canonical `JSON.stringify` text as UTF-8. Decoding rejects invalid UTF-8 and invalid JSON. */
export function createJsonCodec(): Codec<JsonValue> {
  return {
    encode: (value: JsonValue) => encoder.encode(JSON.stringify(value)),
    decode: (data: Uint8Array) => parseJson(decoder.decode(data)),
  }
}
