import type { Seconds } from "@nimbus/clock"

export type CacheTtl = { kind: "seconds"; seconds: Seconds }

export type CacheSetOptions = {
  ttl: CacheTtl
}
