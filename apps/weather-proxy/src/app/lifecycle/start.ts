import type { LifecycleHook } from "@nimbus/server"
import type { AppContext } from "../create-context"

export function createStartHooks(context: AppContext): LifecycleHook[] {
  const { redisClient } = context.services.infra

  if (!redisClient) return []

  return [
    {
      name: "start:redis",
      fn: async () => {
        if (!redisClient.isOpen) await redisClient.connect()
        await redisClient.ping()
      },
    },
  ]
}

export type CreateStartHooksFn = typeof createStartHooks
