export { loadAppConfig, mapEnvToConfig } from "./load-app-config"
export {
  type AppConfig,
  type CacheStore,
  cacheStores,
  DEFAULT_WEATHER_API_BASE_URL,
  type EnvConfig,
  envSchema,
} from "./schema"
