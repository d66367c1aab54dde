import type { ClientErrorStatusCode, ServerErrorStatusCode } from "hono/utils/http-status"

declare const unregistered: unique symbol

/** A 4xx/5xx outside the registered set (e.g. 420, 499, 520). */
export type UnregisteredErrorStatusCode = number & { readonly [unregistered]: true }

/** Any status a JSON error body can be sent with. */
export type ErrorStatusCode =
  | ClientErrorStatusCode
  | ServerErrorStatusCode
  | UnregisteredErrorStatusCode

export function isErrorStatusCode(status: number): status is ErrorStatusCode {
  return Number.isInteger(status) && status >= 400 && status <= 599
}
