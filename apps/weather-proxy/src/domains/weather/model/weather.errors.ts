import type { Milliseconds } from "@nimbus/clock"
import { BaseError } from "@nimbus/errors"

export type WeatherErrorCode =
  | "upstream_unreachable"
  | "upstream_rejected"
  | "upstream_malformed"

/**
 * Failures talking to the weather provider. Context never carries the
 * request URL, since it embeds the API key.
 */
export class WeatherError extends BaseError<WeatherErrorCode> {
  static unreachable(city: string, cause: unknown): WeatherError {
    return new WeatherError(`Weather provider unreachable for "${city}"`, {
      code: "upstream_unreachable",
      context: { city },
      cause,
      isRetryable: true,
    })
  }

  static timedOut(city: string, timeoutMs: Milliseconds): WeatherError {
    return new WeatherError(
      `Weather provider did not answer within ${timeoutMs}ms for "${city}"`,
      {
        code: "upstream_unreachable",
        context: { city, timeoutMs },
        isRetryable: true,
      },
    )
  }

  static rejected(city: string, status: number): WeatherError {
    return new WeatherError(`Weather provider answered ${status} for "${city}"`, {
      code: "upstream_rejected",
      context: { city, status },
      isRetryable: status >= 500,
    })
  }

  static malformed(city: string, cause: unknown): WeatherError {
    return new WeatherError(`Weather provider sent a body that is not JSON for "${city}"`, {
      code: "upstream_malformed",
      context: { city },
      cause,
    })
  }
}
