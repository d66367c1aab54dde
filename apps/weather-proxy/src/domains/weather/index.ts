export { CACHE_STATUS_HEADER, createWeatherModule } from "./api"
export { createWeatherServices, type WeatherServices } from "./composition"
export { weatherCacheKey } from "./keyspace"
export { WeatherError, type WeatherErrorCode } from "./model/weather.errors"
export type { WeatherLookup, WeatherPayload, WeatherSource } from "./model/weather.model"
export {
  type FetchFn,
  HttpWeatherProvider,
  type WeatherProvider,
} from "./services/weather-provider"
export { WeatherService } from "./services/weather-service"
