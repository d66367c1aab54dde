import type { TimeSource, UnixMs } from "@nimbus/clock"
import type { BytesCache } from "../../ports/bytes-cache"
import type { CacheKey } from "../../ports/cache-key"
import type { CacheSetOptions, CacheTtl } from "../../ports/cache-options"
import type { CacheResult } from "../../ports/cache-result"

export type MemoryCacheOptions = {
  /**
   * Maximum number of entries retained in the cache.
   *
   * When a new key would exceed this limit, the oldest insertion is evicted.
   */
  maxEntries: number
}

export type MemoryCacheDeps = {
  clock: TimeSource
}

type MemoryCacheEntry = {
  value: Uint8Array
  expiresAtMs?: UnixMs
}

export class MemoryBytesCache implements BytesCache {
  private readonly store = new Map<CacheKey, MemoryCacheEntry>()

  public constructor(
    private readonly deps: MemoryCacheDeps,
    private readonly opts: MemoryCacheOptions,
  ) {
    if (!Number.isInteger(opts.maxEntries) || opts.maxEntries < 1) {
      throw new RangeError(`maxEntries must be a positive integer, got ${opts.maxEntries}`)
    }
  }

  async get(key: CacheKey): Promise<CacheResult<Uint8Array>> {
    const entry = this.store.get(key)

    if (entry === undefined) return { kind: "miss" }

    if (this.isExpired(entry)) {
      this.store.delete(key)
      return { kind: "miss" }
    }

    return { kind: "hit", value: entry.value }
  }

  async set(
    key: CacheKey,
    value: Uint8Array,
    opts?: Partial<CacheSetOptions>,
  ): Promise<void> {
    // re-insert so an overwrite counts as the newest entry
    this.store.delete(key)
    this.evictOldest()

    this.store.set(key, {
      value,
      ...(opts?.ttl !== undefined && { expiresAtMs: this.toExpiresAtMs(opts.ttl) }),
    })
  }

  size(): number {
    return this.store.size
  }

  private evictOldest(): void {
    for (const key of this.store.keys()) {
      if (this.store.size < this.opts.maxEntries) return

      this.store.delete(key)
    }
  }

  private toExpiresAtMs(ttl: CacheTtl): UnixMs {
    return this.deps.clock.nowMs() + ttl.seconds * 1000
  }

  private isExpired(entry: MemoryCacheEntry): boolean {
    if (entry.expiresAtMs === undefined) return false

    return entry.expiresAtMs <= this.deps.clock.nowMs()
  }
}
