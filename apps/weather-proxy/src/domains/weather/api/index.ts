import { type Application, createRouter } from "@nimbus/server"
import type { WeatherServices } from "../composition"
import { getWeatherHandler } from "./get-weather.handler"

export { CACHE_STATUS_HEADER } from "./get-weather.handler"

type WeatherModuleDeps = {
  weather: WeatherServices
}

export function createWeatherModule(deps: WeatherModuleDeps) {
  return {
    name: "weather",
    register: (app: Application) => {
      const weather = createRouter()

      weather.get("/:city", getWeatherHandler(deps.weather))

      app.route("/weather", weather)
    },
  }
}
