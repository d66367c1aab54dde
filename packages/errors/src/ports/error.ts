/** Machine-readable error code, lower snake_case by convention. */
export type ErrorCode = Lowercase<string>

/**
 * Structured data attached to an error (ids, inputs, upstream status).
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode
  readonly context: ErrorContext

  /** `true` if repeating the operation might succeed. */
  readonly isRetryable: boolean

  /**
   * Expected runtime failure (`true`: bad input, upstream down, timeout) as
   * opposed to a programmer error or broken invariant (`false`).
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * JSON-safe shape of an error, for logs and transport.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
