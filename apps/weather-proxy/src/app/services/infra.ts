import {
  type BytesCache,
  createRedisBytesClient,
  MemoryBytesCache,
  RedisBytesCache,
  type RedisBytesClient,
} from "@nimbus/cache"
import type { FetchFn } from "../../domains/weather/services/weather-provider"
import type { AppConfig } from "../config"
import type { CoreServices } from "./core"

export type InfraServices = {
  fetch: FetchFn
  bytesCache: BytesCache

  /** Present only when the cache store is Redis. */
  redisClient?: RedisBytesClient
}

export type InfraOverrides = Partial<Pick<InfraServices, "fetch" | "bytesCache">>

export function createInfraServices(
  config: AppConfig,
  core: CoreServices,
  overrides: InfraOverrides = {},
): InfraServices {
  const fetch = overrides.fetch ?? globalThis.fetch.bind(globalThis)

  if (overrides.bytesCache) {
    return { fetch, bytesCache: overrides.bytesCache }
  }

  if (config.cache.store === "memory") {
    const bytesCache = new MemoryBytesCache(
      { clock: core.clock },
      { maxEntries: config.cache.memoryMaxEntries },
    )

    return { fetch, bytesCache }
  }

  const redisClient = createRedisBytesClient({
    host: config.redis.host,
    port: config.redis.port,
    connectTimeoutMs: config.redis.connectTimeoutMs,
    ...(config.redis.password !== undefined && { password: config.redis.password }),
  })

  redisClient.on("error", (err) => core.logger.error("Redis client error", { err }))

  const bytesCache = new RedisBytesCache(redisClient, {
    keyspacePrefix: config.redis.keyPrefix,
  })

  return { fetch, bytesCache, redisClient }
}
