import type { Context, RequestHandler } from "@nimbus/server"
import type { WeatherServices } from "../composition"

export const CACHE_STATUS_HEADER = "X-Cache"

export function getWeatherHandler(deps: WeatherServices): RequestHandler {
  return async (c: Context) => {
    const city = c.req.param("city") ?? ""

    const { source, payload } = await deps.weatherService.fetchWeather(city)

    c.header(CACHE_STATUS_HEADER, source === "cache" ? "HIT" : "MISS")

    return c.json(payload)
  }
}
