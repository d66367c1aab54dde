import type { Clock, Milliseconds } from "@nimbus/clock"
import type { Logger, LogLevelName } from "@nimbus/logger"
import type { ErrorMappingsConfig } from "../errors/error-response"
import type { LifecycleHook } from "../lifecycle/lifecycle-hook"
import type { Application } from "./app"

export type PathString = `/${string}`

export interface DisabledConfig {
  enabled: false
}

export interface ServerDependencies {
  logger: Logger
  clock: Clock
}

export interface EnabledRequestIdConfig {
  enabled: true

  /**
   * Header name to read/write request ID.
   * @default "x-request-id"
   */
  header?: string
}

export interface EnabledRequestLoggingConfig {
  enabled: true

  /**
   * Log level for request logging.
   * 5xx responses always log at `error` regardless of this setting.
   * @default "info"
   */
  level?: LogLevelName

  /**
   * Paths to ignore for request logging.
   * @default [livenessPath, readinessPath] if health checks are enabled, otherwise []
   */
  ignorePaths?: PathString[]

  /**
   * Response headers copied onto the log line, keyed by log field name.
   * Headers the response does not carry are left out.
   * @default {}
   * @example { cache: "x-cache" }
   */
  responseHeaderFields?: Record<string, string>
}

export interface ReadinessCheck {
  name: string
  timeoutMs?: Milliseconds
  fn: (signal: AbortSignal) => Promise<boolean>
}

export interface EnabledHealthConfig {
  enabled: true

  /** @default "/health" */
  livenessPath?: PathString

  /** @default "/ready" */
  readinessPath?: PathString

  /**
   * Checks run on each request to the readiness endpoint, in order.
   * @default []
   */
  readinessChecks?: ReadinessCheck[]

  /**
   * Default timeout for readiness checks. Individual checks can override via `timeoutMs`.
   * @default 5_000
   */
  checkTimeoutMs?: Milliseconds
}

export type RequestIdConfig = DisabledConfig | EnabledRequestIdConfig
export type RequestLoggingConfig = DisabledConfig | EnabledRequestLoggingConfig
export type HealthConfig = DisabledConfig | EnabledHealthConfig

export interface ServerOptions {
  port: number

  /** @default "0.0.0.0" */
  host?: string

  /**
   * Budget for all start hooks together.
   * @default 2_147_483_647 (max timer value, effectively no timeout)
   */
  startupTimeoutMs?: Milliseconds

  /**
   * Budget for closing the listener and running stop hooks.
   * @default 10_000
   */
  shutdownTimeoutMs?: Milliseconds

  requestId?: RequestIdConfig
  requestLogging?: RequestLoggingConfig
  health?: HealthConfig

  errorMappings: ErrorMappingsConfig

  routes: (app: Application) => void

  startHooks?: LifecycleHook[]
  stopHooks?: LifecycleHook[]
}

// --- Resolved types ---

export type ResolvedRequestIdConfig = DisabledConfig | Required<EnabledRequestIdConfig>

export type ResolvedRequestLoggingConfig =
  | DisabledConfig
  | Required<EnabledRequestLoggingConfig>

export type ResolvedHealthConfig = DisabledConfig | Required<EnabledHealthConfig>

export type ResolvedServerOptions = {
  port: number
  host: string
  startupTimeoutMs: Milliseconds
  shutdownTimeoutMs: Milliseconds
  requestId: ResolvedRequestIdConfig
  requestLogging: ResolvedRequestLoggingConfig
  health: ResolvedHealthConfig
  errorMappings: ErrorMappingsConfig
  routes: (app: Application) => void
  startHooks: LifecycleHook[]
  stopHooks: LifecycleHook[]
}

// --- Defaults ---

const MAX_TIMER_MS: Milliseconds = 2_147_483_647

interface ServerDefaults {
  host: string
  startupTimeoutMs: Milliseconds
  shutdownTimeoutMs: Milliseconds
  requestId: Required<EnabledRequestIdConfig>
  requestLogging: { enabled: true; level: LogLevelName }
  health: Required<EnabledHealthConfig>
}

export const DEFAULTS: ServerDefaults = {
  host: "0.0.0.0",
  startupTimeoutMs: MAX_TIMER_MS,
  shutdownTimeoutMs: 10_000,
  requestId: {
    enabled: true,
    header: "x-request-id",
  },
  requestLogging: {
    enabled: true,
    level: "info",
  },
  health: {
    enabled: true,
    livenessPath: "/health",
    readinessPath: "/ready",
    readinessChecks: [],
    checkTimeoutMs: 5_000,
  },
}

// --- Resolution ---

export function resolveOptions(options: ServerOptions): ResolvedServerOptions {
  const health = resolveHealthConfig(options)
  const requestId = resolveRequestIdConfig(options)
  const requestLogging = resolveRequestLoggingConfig(options, health)

  return {
    port: options.port,
    host: options.host ?? DEFAULTS.host,
    startupTimeoutMs: options.startupTimeoutMs ?? DEFAULTS.startupTimeoutMs,
    shutdownTimeoutMs: options.shutdownTimeoutMs ?? DEFAULTS.shutdownTimeoutMs,
    requestId,
    requestLogging,
    health,
    errorMappings: options.errorMappings,
    routes: options.routes,
    startHooks: options.startHooks ?? [],
    stopHooks: options.stopHooks ?? [],
  }
}

function resolveHealthConfig(options: ServerOptions): ResolvedHealthConfig {
  if (options.health?.enabled === false) {
    return { enabled: false }
  }

  return {
    ...DEFAULTS.health,
    ...options.health,
    enabled: true,
  }
}

function resolveRequestIdConfig(options: ServerOptions): ResolvedRequestIdConfig {
  if (options.requestId?.enabled === false) {
    return { enabled: false }
  }

  return {
    ...DEFAULTS.requestId,
    ...options.requestId,
    enabled: true,
  }
}

function resolveRequestLoggingConfig(
  options: ServerOptions,
  health: ResolvedHealthConfig,
): ResolvedRequestLoggingConfig {
  if (options.requestLogging?.enabled === false) {
    return { enabled: false }
  }

  return {
    enabled: true,
    level: options.requestLogging?.level ?? DEFAULTS.requestLogging.level,
    ignorePaths:
      options.requestLogging?.ignorePaths ??
      (health.enabled ? [health.livenessPath, health.readinessPath] : []),
    responseHeaderFields: options.requestLogging?.responseHeaderFields ?? {},
  }
}
