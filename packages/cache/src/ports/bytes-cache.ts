import type { CacheKey } from "./cache-key"
import type { CacheSetOptions } from "./cache-options"
import type { CacheResult } from "./cache-result"

/**
 * Byte-oriented cache port implemented by storage adapters.
 *
 * Adapters store values as opaque bytes. Typed access goes through a
 * {@link Codec} via `CodecDataCache`.
 */
export interface BytesCache {
  get(key: CacheKey): Promise<CacheResult<Uint8Array>>

  /** Overwrites any existing entry. Without a TTL the entry does not expire. */
  set(key: CacheKey, value: Uint8Array, opts?: Partial<CacheSetOptions>): Promise<void>
}
