import type { LogLevelName } from "./log-level"

export type LoggerOptions = {
  /** Entries below this level are dropped. */
  level: LogLevelName

  /**
   * Human-readable output through pino-pretty.
   *
   * @remarks
   * Meant for local development; leave off where logs are shipped as JSON.
   */
  prettify?: boolean
}
