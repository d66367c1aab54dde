/**
 * Plain string cache key.
 *
 * Build keys through a {@link CacheNamespace} rather than interpolating at
 * call sites, so formats stay consistent.
 *
 * @example
 * ```ts
 * const key: CacheKey = "weather:london"
 * ```
 */
export type CacheKey = string
