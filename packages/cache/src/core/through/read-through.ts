import type { CacheKey } from "../../ports/cache-key"

export type ReadThroughSource = "cache" | "loader"

export type ReadThroughResult<T> = {
  source: ReadThroughSource
  value: T
}

/**
 * Read-through capability (policy-level).
 * Implementations decide behavior (timeouts, cache error handling, etc).
 */
export interface ReadThrough<T> {
  /** Returns the cached value, or loads, stores and returns it. */
  resolve(key: CacheKey, loader: () => Promise<T>): Promise<ReadThroughResult<T>>
}
