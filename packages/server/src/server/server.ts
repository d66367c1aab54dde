import {
  type CreateErrorHandlerFn,
  createErrorHandler,
} from "../errors/create-error-handler"
import { type BuildAppFn, buildApp } from "../lifecycle/build-app"
import {
  type CreateStopperFn,
  createStopper,
  type ServerHandle,
} from "../lifecycle/create-stopper"
import { type ListenFn, listen } from "../lifecycle/listen"
import { type ShutdownFn, type StopResult, shutdown } from "../lifecycle/shutdown"
import {
  type SetupProcessHandlersFn,
  type SignalHandler,
  setupProcessHandlers,
} from "../lifecycle/signals"
import { type StartupFn, startup } from "../lifecycle/startup"
import { StartupError } from "../lifecycle/startup-error"
import {
  type CreateDefaultMiddlewareFn,
  createDefaultMiddleware,
} from "../middleware/create-default-middleware"
import { type Application, createApp } from "./app"
import {
  type ResolvedServerOptions,
  resolveOptions,
  type ServerDependencies,
  type ServerOptions,
} from "./server-options"

/** `idle` -> `starting` -> `started` -> `stopping` -> `stopped`; a failed start returns to `idle`. */
export type ServerState = "idle" | "starting" | "started" | "stopping" | "stopped"

export interface ServerCollaborators {
  onStartup: StartupFn
  onShutdown: ShutdownFn
  listen: ListenFn
  buildApp: BuildAppFn
  createStopper: CreateStopperFn
  setupProcessHandlers: SetupProcessHandlersFn
  createDefaultMiddleware: CreateDefaultMiddlewareFn
  createErrorHandler: CreateErrorHandlerFn
}

const defaultCollaborators: ServerCollaborators = {
  onStartup: startup,
  onShutdown: shutdown,
  listen,
  buildApp,
  createStopper,
  setupProcessHandlers,
  createDefaultMiddleware,
  createErrorHandler,
}

export class Server {
  readonly app: Application

  private state: ServerState = "idle"
  private ready = false
  private built = false
  private runningServer?: ServerHandle
  private signalHandler?: SignalHandler

  constructor(
    private readonly deps: ServerDependencies,
    private readonly options: ResolvedServerOptions,
    private readonly collabs: ServerCollaborators = defaultCollaborators,
  ) {
    this.app = createApp()
  }

  /**
   * Wires middleware, health and application routes onto `app` without
   * listening. Idempotent; `start()` calls it.
   */
  build(): Application {
    if (this.built) return this.app

    this.collabs.buildApp({
      app: this.app,
      clock: this.deps.clock,
      options: this.options,
      isReady: () => this.ready,
      errorHandler: this.collabs.createErrorHandler(this.options, this.deps.logger),
      defaultMiddleware: this.collabs.createDefaultMiddleware(this.options, this.deps.logger),
    })

    this.built = true

    return this.app
  }

  setupProcessHandlers(): this {
    if (this.signalHandler) return this

    this.signalHandler = this.collabs.setupProcessHandlers({
      logger: this.deps.logger,
      stop: () => this.stop(),
    })

    return this
  }

  /**
   * Runs start hooks under the startup deadline, then listens.
   *
   * @throws {StartupError} when a start hook fails or the deadline passes
   * @throws the bind error when the port cannot be listened on
   */
  async start(): Promise<ServerHandle> {
    if (this.state === "started") throw new Error("Server already started")
    if (this.state !== "idle") throw new Error(`Cannot start a server that is ${this.state}`)

    this.state = "starting"

    try {
      const result = await this.collabs.onStartup({
        clock: this.deps.clock,
        logger: this.deps.logger,
        timeoutMs: this.options.startupTimeoutMs,
        startHooks: this.options.startHooks,
      })

      if (!result.ok) throw StartupError.fromResult(result)

      const server = await this.collabs.listen(this.build(), this.options, this.deps.logger)

      const handle = this.collabs.createStopper({
        deps: this.deps,
        server,
        options: this.options,
        stopHooks: this.options.stopHooks,
        setReady: (v) => {
          this.ready = v
        },
        shutdown: this.collabs.onShutdown,
        onStop: () => {
          this.state = "stopped"
          this.signalHandler?.unregister()
        },
      })

      this.runningServer = handle
      this.ready = true
      this.state = "started"

      return handle
    } catch (err) {
      this.state = "idle"
      this.ready = false

      throw err
    }
  }

  stop(): Promise<StopResult> {
    if (!this.runningServer) return this.noopStop()
    if (this.state === "started") this.state = "stopping"

    return this.runningServer.stop()
  }

  getState(): ServerState {
    return this.state
  }

  isReady(): boolean {
    return this.ready
  }

  private noopStop(): Promise<StopResult> {
    this.deps.logger.warn("Stop called but server not running")

    return Promise.resolve({ ok: true, failures: [], timedOut: false, durationMs: 0 })
  }
}

export function createServer(deps: ServerDependencies, options: ServerOptions): Server {
  return new Server(deps, resolveOptions(options))
}
