import type { BytesCache } from "../ports/bytes-cache"
import type { CacheKey } from "../ports/cache-key"
import type { CacheSetOptions } from "../ports/cache-options"
import type { CacheResult } from "../ports/cache-result"
import type { Codec } from "../ports/codec"
import type { DataCache } from "../ports/data-cache"
import { CacheDecodeError } from "./errors/cache-error"

export class CodecDataCache<T> implements DataCache<T> {
  public constructor(
    private readonly bytesCache: BytesCache,
    private readonly codec: Codec<T>,
  ) {}

  /**
   * @throws {CacheDecodeError} when the stored bytes do not decode
   */
  async get(key: CacheKey): Promise<CacheResult<T>> {
    const res = await this.bytesCache.get(key)

    if (res.kind === "miss") return res

    return { kind: "hit", value: this.decode(key, res.value) }
  }

  async set(key: CacheKey, value: T, opts?: Partial<CacheSetOptions>): Promise<void> {
    await this.bytesCache.set(key, this.codec.encode(value), opts)
  }

  private decode(key: CacheKey, bytes: Uint8Array): T {
    try {
      return this.codec.decode(bytes)
    } catch (err) {
      throw CacheDecodeError.of(key, err)
    }
  }
}
