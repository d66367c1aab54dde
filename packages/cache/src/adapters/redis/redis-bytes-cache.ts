import type { BytesCache } from "../../ports/bytes-cache"
import type { CacheKey } from "../../ports/cache-key"
import type { CacheSetOptions, CacheTtl } from "../../ports/cache-options"
import type { CacheResult } from "../../ports/cache-result"
import type { KeyspacePrefix } from "../../ports/keyspace-prefix"
import type { RedisBytesClient, RedisTtl } from "./redis-client"

export type RedisBytesCacheOptions = {
  /** Prepended to every key, e.g. `"prod:"`. Empty stores keys as given. */
  keyspacePrefix: KeyspacePrefix
}

/** Redis only takes a whole, positive EX, so TTLs round up to at least one second. */
export function toRedisTtl(ttl: CacheTtl): RedisTtl {
  return { EX: Math.max(1, Math.ceil(ttl.seconds)) }
}

export class RedisBytesCache implements BytesCache {
  public constructor(
    private readonly client: RedisBytesClient,
    private readonly opts: RedisBytesCacheOptions,
  ) {}

  async get(key: CacheKey): Promise<CacheResult<Uint8Array>> {
    const reply = await this.client.get(this.redisKey(key))

    return reply === null ? { kind: "miss" } : { kind: "hit", value: new Uint8Array(reply) }
  }

  async set(key: CacheKey, value: Uint8Array, opts?: Partial<CacheSetOptions>): Promise<void> {
    const redisKey = this.redisKey(key)

    if (opts?.ttl === undefined) {
      await this.client.set(redisKey, value)
      return
    }

    await this.client.set(redisKey, value, toRedisTtl(opts.ttl))
  }

  private redisKey(key: CacheKey): string {
    return this.opts.keyspacePrefix + key
  }
}
