import { type Milliseconds, type Sleeper, withTimeout } from "@nimbus/clock"
import type { Logger } from "@nimbus/logger"
import type { CacheKey } from "../../ports/cache-key"
import type { CacheTtl } from "../../ports/cache-options"
import type { CacheResult } from "../../ports/cache-result"
import type { DataCache } from "../../ports/data-cache"
import { CacheDecodeError, CacheUnavailableError } from "../errors/cache-error"
import type { ReadThrough, ReadThroughResult } from "./read-through"

export type CacheAsideReadThroughDeps<T> = {
  cache: DataCache<T>
  clock: Sleeper
  logger: Logger
}

export type CacheAsideReadThroughOptions = {
  /** TTL applied to every write. */
  ttl: CacheTtl
  readTimeoutMs: Milliseconds
  writeTimeoutMs: Milliseconds
}

/**
 * Cache-aside read-through where the cache never fails a read.
 *
 * - Store errors, read timeouts and undecodable entries are logged and
 *   treated as a miss.
 * - Loader errors propagate and nothing is written.
 * - Writes happen after a successful load; failures and timeouts are logged.
 * - Concurrent misses on one key each call the loader (last write wins).
 */
export class CacheAsideReadThrough<T> implements ReadThrough<T> {
  constructor(
    private readonly deps: CacheAsideReadThroughDeps<T>,
    private readonly opts: CacheAsideReadThroughOptions,
  ) {}

  async resolve(key: CacheKey, loader: () => Promise<T>): Promise<ReadThroughResult<T>> {
    const cached = await this.read(key)

    if (cached.kind === "hit") return { source: "cache", value: cached.value }

    const value = await loader()

    await this.write(key, value)

    return { source: "loader", value }
  }

  private async read(key: CacheKey): Promise<CacheResult<T>> {
    const outcome = await withTimeout(this.deps.clock, this.opts.readTimeoutMs, () =>
      this.deps.cache.get(key),
    )

    if (outcome.kind === "completed") return outcome.value

    if (outcome.kind === "timed_out") {
      this.deps.logger.warn("Cache read timed out, treating as miss", {
        key,
        err: CacheUnavailableError.timedOut("get", key, outcome.timeoutMs),
      })
    } else if (outcome.error instanceof CacheDecodeError) {
      this.deps.logger.warn("Cache entry is corrupt, treating as miss", {
        key,
        err: outcome.error,
      })
    } else {
      this.deps.logger.warn("Cache read failed, treating as miss", {
        key,
        err: CacheUnavailableError.failed("get", key, outcome.error),
      })
    }

    return { kind: "miss" }
  }

  private async write(key: CacheKey, value: T): Promise<void> {
    const outcome = await withTimeout(this.deps.clock, this.opts.writeTimeoutMs, () =>
      this.deps.cache.set(key, value, { ttl: this.opts.ttl }),
    )

    if (outcome.kind === "timed_out") {
      this.deps.logger.warn("Cache write timed out", {
        key,
        err: CacheUnavailableError.timedOut("set", key, outcome.timeoutMs),
      })
    } else if (outcome.kind === "failed") {
      this.deps.logger.warn("Cache write failed", {
        key,
        err: CacheUnavailableError.failed("set", key, outcome.error),
      })
    }
  }
}
