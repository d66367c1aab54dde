import {
  createWeatherServices,
  type WeatherServices,
} from "../../domains/weather/composition"
import type { AppConfig } from "../config"
import { type CoreServices, createCoreServices } from "./core"
import { createInfraServices, type InfraOverrides, type InfraServices } from "./infra"

export type AppServices = {
  core: CoreServices
  infra: InfraServices
  weather: WeatherServices
}

export type ServiceOverrides = {
  core?: Partial<CoreServices>
  infra?: InfraOverrides
}

export function createAppServices(
  config: AppConfig,
  overrides: ServiceOverrides = {},
): AppServices {
  const core = createCoreServices(config, overrides.core)
  const infra = createInfraServices(config, core, overrides.infra)
  const weather = createWeatherServices(config, core, infra)

  return { core, infra, weather }
}
