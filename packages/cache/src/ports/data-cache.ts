import type { CacheKey } from "./cache-key"
import type { CacheSetOptions } from "./cache-options"
import type { CacheResult } from "./cache-result"

/**
 * DataCache represents a cache for derived, non-authoritative data.
 *
 * @remarks
 * - Cached values may be evicted at any time.
 * - Cache operations are best-effort; they must not be relied on for correctness.
 *
 * If losing this data would cause an incident, it does not belong behind this port.
 */
export interface DataCache<T> {
  /**
   * Retrieve a value from the cache.
   *
   * A miss does not imply absence in the source of truth.
   */
  get(key: CacheKey): Promise<CacheResult<T>>

  /**
   * Store a value. Overwrites are allowed and the entry may still be evicted
   * before its TTL.
   */
  set(key: CacheKey, value: T, opts?: Partial<CacheSetOptions>): Promise<void>
}
