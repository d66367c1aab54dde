import type { Application } from "@nimbus/server"
import { createWeatherModule } from "../../domains/weather/api"
import type { AppServices } from "../services"

export type ApiModule = {
  name: string
  register: (app: Application) => void
}

export function registerRoutes(app: Application, services: AppServices): void {
  const modules: ApiModule[] = [createWeatherModule({ weather: services.weather })]

  for (const m of modules) {
    m.register(app)
  }
}

export type RegisterRoutesFn = typeof registerRoutes
