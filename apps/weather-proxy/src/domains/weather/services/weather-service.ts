import type { ReadThrough } from "@nimbus/cache"
import type { Logger } from "@nimbus/logger"
import { weatherCacheKey } from "../keyspace"
import type { WeatherLookup, WeatherPayload } from "../model/weather.model"
import type { WeatherProvider } from "./weather-provider"

export type WeatherServiceDeps = {
  readThrough: ReadThrough<WeatherPayload>
  provider: WeatherProvider
  logger: Logger
}

export class WeatherService {
  constructor(private readonly deps: WeatherServiceDeps) {}

  /**
   * Cached payload when there is one, otherwise the provider's, which is
   * then cached best-effort.
   *
   * @throws {WeatherError} when the provider is consulted and fails
   */
  async fetchWeather(city: string): Promise<WeatherLookup> {
    const key = weatherCacheKey(city)

    const { source, value } = await this.deps.readThrough.resolve(key, () =>
      this.deps.provider.fetchCity(city),
    )

    if (source === "cache") {
      this.deps.logger.info("Serving from cache", { city, key })
      return { source: "cache", payload: value }
    }

    this.deps.logger.info("Serving from upstream", { city, key })
    return { source: "upstream", payload: value }
  }
}
