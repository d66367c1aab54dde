import { type ConfigSource, DotenvSource, EnvSource, loadConfig } from "@nimbus/config"
import { type AppConfig, type EnvConfig, envSchema } from "./schema"

export function mapEnvToConfig(env: EnvConfig): AppConfig {
  return {
    server: {
      host: env.HOST,
      port: env.PORT,
      startupTimeoutMs: env.STARTUP_TIMEOUT_MS,
      shutdownTimeoutMs: env.SHUTDOWN_TIMEOUT_MS,
    },
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
      serviceName: env.SERVICE_NAME,
    },
    requestId: {
      header: env.REQUEST_ID_HEADER,
    },
    requestLogging: {
      enabled: env.REQUEST_LOGGING_ENABLED,
      level: env.REQUEST_LOGGING_LEVEL,
    },
    weatherApi: {
      baseUrl: env.WEATHER_API_BASE_URL.replace(/\/+$/, ""),
      apiKey: env.WEATHER_API_KEY,
      timeoutMs: env.UPSTREAM_TIMEOUT_MS,
    },
    cache: {
      store: env.CACHE_STORE,
      ttlSeconds: env.CACHE_TTL_SECONDS,
      readTimeoutMs: env.CACHE_READ_TIMEOUT_MS,
      writeTimeoutMs: env.CACHE_WRITE_TIMEOUT_MS,
      memoryMaxEntries: env.CACHE_MEMORY_MAX_ENTRIES,
    },
    redis: {
      host: env.REDIS_HOST,
      port: env.REDIS_PORT,
      keyPrefix: env.REDIS_KEY_PREFIX,
      connectTimeoutMs: env.REDIS_CONNECT_TIMEOUT_MS,
      ...(env.REDIS_PASSWORD !== "" && { password: env.REDIS_PASSWORD }),
    },
  }
}

/**
 * Later sources win: `.env.${NODE_ENV}`, then `.env`, then the process
 * environment.
 *
 * @throws {ConfigError} when the merged values do not satisfy the schema
 */
export async function loadAppConfig(
  env: NodeJS.ProcessEnv,
  cwd: string = process.cwd(),
): Promise<AppConfig> {
  const nodeEnv = env.NODE_ENV

  const sources: ConfigSource[] = [
    ...(nodeEnv
      ? [new DotenvSource({ file: `.env.${nodeEnv}`, required: false, cwd })]
      : []),
    new DotenvSource({ file: ".env", required: false, cwd }),
    new EnvSource({ env }),
  ]

  return mapEnvToConfig(await loadConfig({ schema: envSchema, sources }))
}
