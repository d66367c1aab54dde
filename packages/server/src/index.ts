export type { ErrorHandler } from "./errors/create-error-handler"
export {
  createErrorFormatter,
  DEFAULT_FALLBACK,
  type ErrorMapping,
  type ErrorMappingsConfig,
  type ErrorResponse,
  type ErrorStatusResolver,
  type FallbackMapping,
} from "./errors/error-response"
export { type ErrorStatusCode, isErrorStatusCode } from "./http/status-codes"
export type { ServerHandle } from "./lifecycle/create-stopper"
export type {
  HookFailure,
  LifecycleHook,
  LifecycleHookContext,
} from "./lifecycle/lifecycle-hook"
export type { StopResult } from "./lifecycle/shutdown"
export { StartupError } from "./lifecycle/startup-error"
export {
  type Application,
  type Context,
  createApp,
  createRouter,
  type Middleware,
  type RequestHandler,
  type Router,
} from "./server/app"
export { createServer, Server, type ServerState } from "./server/server"
export type {
  ReadinessCheck,
  ServerDependencies,
  ServerOptions,
} from "./server/server-options"
