import { BaseError } from "@nimbus/errors"
import type { CacheKey } from "../../ports/cache-key"

export type CacheErrorCode = "cache_corrupt" | "cache_unavailable"

export type CacheOperation = "get" | "set"

/**
 * The cache store failed or did not answer in time. Operational and retryable.
 */
export class CacheUnavailableError extends BaseError<"cache_unavailable"> {
  static failed(op: CacheOperation, key: CacheKey, cause: unknown): CacheUnavailableError {
    return new CacheUnavailableError(`Cache ${op} failed for "${key}"`, {
      code: "cache_unavailable",
      context: { op, key },
      cause,
      isRetryable: true,
    })
  }

  static timedOut(op: CacheOperation, key: CacheKey, timeoutMs: number): CacheUnavailableError {
    return new CacheUnavailableError(`Cache ${op} timed out after ${timeoutMs}ms for "${key}"`, {
      code: "cache_unavailable",
      context: { op, key, timeoutMs },
      isRetryable: true,
    })
  }
}

/** A stored entry could not be decoded. */
export class CacheDecodeError extends BaseError<"cache_corrupt"> {
  static of(key: CacheKey, cause: unknown): CacheDecodeError {
    return new CacheDecodeError(`Cache entry for "${key}" could not be decoded`, {
      code: "cache_corrupt",
      context: { key },
      cause,
    })
  }
}
