export {
  MemoryBytesCache,
  type MemoryCacheDeps,
  type MemoryCacheOptions,
} from "./adapters/memory/memory-bytes-cache"
export { RedisBytesCache, type RedisBytesCacheOptions } from "./adapters/redis/redis-bytes-cache"
export {
  createRedisBytesClient,
  type RedisBytesClient,
  type RedisConnectionOptions,
  type RedisTtl,
} from "./adapters/redis/redis-client"
export { CodecDataCache } from "./core/codec-data-cache"
export {
  CacheDecodeError,
  type CacheErrorCode,
  type CacheOperation,
  CacheUnavailableError,
} from "./core/errors/cache-error"
export { createCacheNamespace } from "./core/namespace/create-cache-namespace"
export {
  CacheAsideReadThrough,
  type CacheAsideReadThroughDeps,
  type CacheAsideReadThroughOptions,
} from "./core/through/cache-aside-read-through"
export type {
  ReadThrough,
  ReadThroughResult,
  ReadThroughSource,
} from "./core/through/read-through"
export type { BytesCache } from "./ports/bytes-cache"
export type { CacheKey } from "./ports/cache-key"
export type { CacheNamespace } from "./ports/cache-namespace"
export type { CacheSetOptions, CacheTtl } from "./ports/cache-options"
export type { CacheHit, CacheMiss, CacheResult } from "./ports/cache-result"
export type { Codec } from "./ports/codec"
export type { DataCache } from "./ports/data-cache"
export type { KeyspacePrefix } from "./ports/keyspace-prefix"
