import { fileURLToPath } from "node:url"
import { type AppConfig, loadAppConfig } from "./config"
import { type CreateStartHooksFn, createStartHooks } from "./lifecycle/start"
import { type CreateStopHooksFn, createStopHooks } from "./lifecycle/stop"
import { type RegisterRoutesFn, registerRoutes } from "./routes/register-routes"
import { type AppServices, createAppServices, type ServiceOverrides } from "./services"

export type AppContextOptions = ServiceOverrides & {
  /** @default process.env */
  env?: NodeJS.ProcessEnv

  /** Directory the `.env` files are read from. Defaults to the app's root. */
  cwd?: string
}

export type AppContext = {
  config: AppConfig
  services: AppServices
  registerRoutes: RegisterRoutesFn
  createStartHooks: CreateStartHooksFn
  createStopHooks: CreateStopHooksFn
}

export async function createAppContext(
  options: AppContextOptions = {},
): Promise<AppContext> {
  const projectRoot = fileURLToPath(new URL("../..", import.meta.url))

  const config = await loadAppConfig(options.env ?? process.env, options.cwd ?? projectRoot)

  const services = createAppServices(config, options)

  return {
    config,
    services,
    registerRoutes,
    createStartHooks,
    createStopHooks,
  }
}
