import { createClient, RESP_TYPES } from "redis"

export type RedisTtl = { EX: number }

/**
 * The subset of a node-redis client the cache uses, with bulk strings read
 * back as `Buffer`.
 */
export type RedisBytesClient = {
  get(key: string): Promise<Buffer | null>
  set(key: string, value: Uint8Array | Buffer, opts?: RedisTtl): Promise<unknown>
  ping(): Promise<unknown>

  connect(): Promise<unknown>
  quit(): Promise<unknown>
  readonly isOpen: boolean

  on(event: "error", listener: (err: Error) => void): unknown
}

export type RedisConnectionOptions = {
  host: string
  port: number

  /** Sent with AUTH when set. */
  password?: string

  connectTimeoutMs: number
}

export function createRedisBytesClient(opts: RedisConnectionOptions): RedisBytesClient {
  return createClient({
    socket: {
      host: opts.host,
      port: opts.port,
      connectTimeout: opts.connectTimeoutMs,
    },
    ...(opts.password !== undefined && { password: opts.password }),
  }).withTypeMapping({
    [RESP_TYPES.BLOB_STRING]: Buffer,
  }) as unknown as RedisBytesClient
}
