import type { JsonValue } from "../../../lib/json"

/** Provider response body, passed through untouched. */
export type WeatherPayload = JsonValue

export type WeatherSource = "cache" | "upstream"

export type WeatherLookup = {
  source: WeatherSource
  payload: WeatherPayload
}
