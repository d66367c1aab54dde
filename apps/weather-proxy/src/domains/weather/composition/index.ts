import { CacheAsideReadThrough, CodecDataCache } from "@nimbus/cache"
import type { AppConfig } from "../../../app/config"
import type { CoreServices } from "../../../app/services/core"
import type { InfraServices } from "../../../app/services/infra"
import { createJsonCodec } from "../../../lib/json-codec"
import type { WeatherPayload } from "../model/weather.model"
import { HttpWeatherProvider, type WeatherProvider } from "../services/weather-provider"
import { WeatherService } from "../services/weather-service"

export type WeatherServices = {
  weatherService: WeatherService
  provider: WeatherProvider
}

export function createWeatherServices(
  config: AppConfig,
  core: CoreServices,
  infra: InfraServices,
): WeatherServices {
  const logger = core.logger.child({ component: "weather" })

  const readThrough = new CacheAsideReadThrough<WeatherPayload>(
    {
      cache: new CodecDataCache(infra.bytesCache, createJsonCodec()),
      clock: core.clock,
      logger,
    },
    {
      ttl: { kind: "seconds", seconds: config.cache.ttlSeconds },
      readTimeoutMs: config.cache.readTimeoutMs,
      writeTimeoutMs: config.cache.writeTimeoutMs,
    },
  )

  const provider = new HttpWeatherProvider(
    { fetch: infra.fetch, clock: core.clock, logger },
    {
      baseUrl: config.weatherApi.baseUrl,
      apiKey: config.weatherApi.apiKey,
      timeoutMs: config.weatherApi.timeoutMs,
    },
  )

  const weatherService = new WeatherService({ readThrough, provider, logger })

  return { weatherService, provider }
}
