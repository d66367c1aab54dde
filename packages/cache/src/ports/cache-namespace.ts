import type { CacheKey } from "./cache-key"

/**
 * A logical namespace used to construct cache keys.
 *
 * Namespaces are an application-level concern. They compose with the
 * adapter-level keyspace prefix:
 *
 * ```
 * <adapter prefix> + <namespace prefix> + ":" + <key parts joined by ":">
 * ```
 *
 * Adapters treat the resulting {@link CacheKey} as an opaque string.
 */
export interface CacheNamespace {
  readonly prefix: string

  key(...parts: readonly (string | number)[]): CacheKey
}
