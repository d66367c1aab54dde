import { type AppError, type ErrorCode, isAppError } from "@nimbus/errors"
import type { ErrorStatusCode } from "../http/status-codes"

export type ErrorStatusResolver = (error: AppError) => ErrorStatusCode

export type ErrorMapping = {
  /** A fixed status, or one derived from the error (e.g. an upstream status in its context). */
  status: ErrorStatusCode | ErrorStatusResolver

  /**
   * User-facing error message.
   *
   * @remarks
   * Should not expose sensitive information.
   */
  message: string
}

export type FallbackMapping = {
  code: ErrorCode
  status: ErrorStatusCode
  message: string
}

export interface ErrorMappingsConfig {
  /**
   * Map of error code to status/message.
   * Unmapped AppErrors use the fallback status/message but keep their code for logging.
   */
  mappings: Partial<Record<ErrorCode, ErrorMapping>>

  /** Fallback for unmapped or unknown errors. */
  fallback?: FallbackMapping
}

export type ErrorResponse = {
  error: string
}

export type FormattedError = {
  status: ErrorStatusCode
  code: ErrorCode
  body: ErrorResponse
}

export type ErrorFormatter = (error: unknown) => FormattedError

export const DEFAULT_FALLBACK: FallbackMapping = {
  code: "internal_error",
  status: 500,
  message: "Internal server error",
}

/**
 * Creates a formatter that maps thrown values to a status and a flat
 * `{ error: message }` body.
 *
 * - Mapped `AppError`s use their configured status/message
 * - Unmapped `AppError`s keep their code but use the fallback status/message
 * - Anything else uses the fallback entirely
 */
export function createErrorFormatter(config: ErrorMappingsConfig): ErrorFormatter {
  const fallback = config.fallback ?? DEFAULT_FALLBACK

  return (error: unknown): FormattedError => {
    if (!isAppError(error)) {
      return { status: fallback.status, code: fallback.code, body: { error: fallback.message } }
    }

    const mapping = config.mappings[error.code]

    if (mapping === undefined) {
      return { status: fallback.status, code: error.code, body: { error: fallback.message } }
    }

    return {
      status: resolveStatus(mapping, error, fallback.status),
      code: error.code,
      body: { error: mapping.message },
    }
  }
}

function resolveStatus(
  mapping: ErrorMapping,
  error: AppError,
  fallbackStatus: ErrorStatusCode,
): ErrorStatusCode {
  if (typeof mapping.status !== "function") return mapping.status

  try {
    return mapping.status(error)
  } catch {
    return fallbackStatus
  }
}
