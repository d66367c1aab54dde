import type { Milliseconds, Seconds } from "@nimbus/clock"
import { type LogLevelName, logLevelNames } from "@nimbus/logger"
import { z } from "zod/mini"

export const DEFAULT_WEATHER_API_BASE_URL =
  "https://weather.visualcrossing.com/VisualCrossingWebServices/rest/services/timeline"

/** Node clamps larger timer delays to 1 ms. */
const MAX_TIMER_MS = 2_147_483_647

const timeoutMs = () => z.coerce.number().check(z.positive(), z.lte(MAX_TIMER_MS))
const positive = () => z.coerce.number().check(z.positive())
const positiveInt = () => z.coerce.number().check(z.positive(), z.multipleOf(1))

export const cacheStores = ["redis", "memory"] as const

export type CacheStore = (typeof cacheStores)[number]

export const envSchema = z.object({
  SERVICE_NAME: z._default(z.string(), "weather-proxy"),
  HOST: z._default(z.string(), "0.0.0.0"),
  PORT: z._default(z.coerce.number().check(z.gte(0), z.lte(65_535), z.multipleOf(1)), 3000),
  STARTUP_TIMEOUT_MS: z._default(timeoutMs(), 15_000),
  SHUTDOWN_TIMEOUT_MS: z._default(timeoutMs(), 10_000),

  LOG_LEVEL: z._default(z.enum(logLevelNames), "info"),
  LOG_PRETTY: z._default(z.stringbool(), false),

  REQUEST_ID_HEADER: z._default(z.string().check(z.minLength(1)), "x-request-id"),
  REQUEST_LOGGING_ENABLED: z._default(z.stringbool(), true),
  REQUEST_LOGGING_LEVEL: z._default(z.enum(logLevelNames), "info"),

  WEATHER_API_KEY: z.string().check(z.trim(), z.minLength(1)),
  WEATHER_API_BASE_URL: z._default(z.url(), DEFAULT_WEATHER_API_BASE_URL),
  UPSTREAM_TIMEOUT_MS: z._default(timeoutMs(), 10_000),

  CACHE_STORE: z._default(z.enum(cacheStores), "redis"),
  CACHE_TTL_SECONDS: z._default(positive(), 43_200),
  CACHE_READ_TIMEOUT_MS: z._default(timeoutMs(), 1_000),
  CACHE_WRITE_TIMEOUT_MS: z._default(timeoutMs(), 1_000),
  CACHE_MEMORY_MAX_ENTRIES: z._default(positiveInt(), 10_000),

  REDIS_HOST: z._default(z.string(), "localhost"),
  REDIS_PORT: z._default(positiveInt(), 6379),
  REDIS_PASSWORD: z._default(z.string(), ""),
  REDIS_KEY_PREFIX: z._default(z.string(), ""),
  REDIS_CONNECT_TIMEOUT_MS: z._default(timeoutMs(), 5_000),
})

export type EnvConfig = z.infer<typeof envSchema>

export type AppConfig = {
  server: {
    host: string
    port: number
    startupTimeoutMs: Milliseconds
    shutdownTimeoutMs: Milliseconds
  }

  logging: {
    level: LogLevelName
    prettify: boolean
    serviceName: string
  }

  requestId: {
    header: string
  }

  requestLogging: {
    enabled: boolean
    level: LogLevelName
  }

  weatherApi: {
    baseUrl: string
    apiKey: string
    timeoutMs: Milliseconds
  }

  cache: {
    store: CacheStore
    ttlSeconds: Seconds
    readTimeoutMs: Milliseconds
    writeTimeoutMs: Milliseconds
    memoryMaxEntries: number
  }

  redis: {
    host: string
    port: number
    /** Unset means no AUTH. */
    password?: string
    keyPrefix: string
    connectTimeoutMs: Milliseconds
  }
}
