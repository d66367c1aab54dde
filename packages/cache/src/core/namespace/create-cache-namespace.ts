import type { CacheKey } from "../../ports/cache-key"
import type { CacheNamespace } from "../../ports/cache-namespace"

export function createCacheNamespace(prefix: string): CacheNamespace {
  return {
    prefix,
    key(...parts: readonly (string | number)[]): CacheKey {
      return [prefix, ...parts].join(":")
    },
  }
}
