/**
 * Well-known fields bound to a logger via `child()` or passed per call.
 */
export type LogContext = {
  requestId: string

  method: string
  path: string
  route: string

  service: string
  module: string
  env: string
}

export type LogOutcome = {
  status: number
  durationMs: number
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogOutcome> &
  Partial<LogEvent> &
  Record<string, unknown>

export type LogBindings = Partial<LogContext> & Record<string, unknown>
