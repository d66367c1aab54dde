import { type Clock, type Milliseconds, withTimeout } from "@nimbus/clock"
import type { Logger } from "@nimbus/logger"
import { parseJson } from "../../../lib/json"
import { WeatherError } from "../model/weather.errors"
import type { WeatherPayload } from "../model/weather.model"

export type FetchFn = typeof fetch

export interface WeatherProvider {
  /**
   * @throws {WeatherError} `upstream_unreachable`, `upstream_rejected` or `upstream_malformed`
   */
  fetchCity(city: string): Promise<WeatherPayload>
}

export type HttpWeatherProviderDeps = {
  fetch: FetchFn
  clock: Clock
  logger: Logger
}

export type HttpWeatherProviderOptions = {
  /** Without a trailing slash. */
  baseUrl: string
  apiKey: string
  timeoutMs: Milliseconds
}

type UpstreamReply = { ok: true; status: number; text: string } | { ok: false; status: number }

/**
 * GETs `{baseUrl}/{city}?key={apiKey}`. The whole exchange, body included,
 * shares one timeout. No retries.
 */
export class HttpWeatherProvider implements WeatherProvider {
  constructor(
    private readonly deps: HttpWeatherProviderDeps,
    private readonly opts: HttpWeatherProviderOptions,
  ) {}

  async fetchCity(city: string): Promise<WeatherPayload> {
    const startedAt = this.deps.clock.nowMs()

    const outcome = await withTimeout(this.deps.clock, this.opts.timeoutMs, (signal) =>
      this.exchange(city, signal),
    )

    if (outcome.kind === "timed_out") throw WeatherError.timedOut(city, outcome.timeoutMs)
    if (outcome.kind === "failed") throw WeatherError.unreachable(city, outcome.error)

    const reply = outcome.value

    this.deps.logger.debug("Weather provider responded", {
      city,
      status: reply.status,
      durationMs: this.deps.clock.nowMs() - startedAt,
    })

    if (!reply.ok) throw WeatherError.rejected(city, reply.status)

    try {
      return parseJson(reply.text)
    } catch (err) {
      throw WeatherError.malformed(city, err)
    }
  }

  private async exchange(city: string, signal: AbortSignal): Promise<UpstreamReply> {
    const res = await this.deps.fetch(`${this.opts.baseUrl}/${city}?key=${this.opts.apiKey}`, {
      signal,
      headers: { accept: "application/json" },
    })

    if (!res.ok) {
      await res.body?.cancel()
      return { ok: false, status: res.status }
    }

    return { ok: true, status: res.status, text: await res.text() }
  }
}
