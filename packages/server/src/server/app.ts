import { type Handler, Hono, type Context as HonoContext, type MiddlewareHandler } from "hono"

export type Application = Hono
export type Router = Hono
export type Context = HonoContext
export type Middleware = MiddlewareHandler
export type RequestHandler = Handler

export function createApp(): Application {
  return new Hono()
}

export function createRouter(): Router {
  return new Hono()
}
