import { type CacheKey, createCacheNamespace } from "@nimbus/cache"

const WEATHER_NS = createCacheNamespace("weather")

/** `weather:<city>` with the city lowercased, so any casing shares one entry. */
export function weatherCacheKey(city: string): CacheKey {
  return WEATHER_NS.key(city.toLowerCase())
}
