/**
 * Bidirectional transform between a typed value and its stored bytes.
 *
 * Codecs sit between typed cache usage (`DataCache<T>`) and byte-oriented
 * adapters. They should be pure and deterministic. `decode` throws when the
 * bytes are not a valid encoding.
 *
 * @example
 * ```ts
 * const textCodec: Codec<string> = {
 *   encode: (value) => new TextEncoder().encode(value),
 *   decode: (bytes) => new TextDecoder().decode(bytes),
 * }
 * ```
 */
export interface Codec<T> {
  encode(value: T): Uint8Array
  decode(bytes: Uint8Array): T
}
