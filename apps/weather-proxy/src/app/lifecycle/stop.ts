import type { LifecycleHook } from "@nimbus/server"
import type { AppContext } from "../create-context"

export function createStopHooks(context: AppContext): LifecycleHook[] {
  const { redisClient } = context.services.infra

  if (!redisClient) return []

  return [
    {
      name: "stop:redis",
      fn: async () => {
        if (redisClient.isOpen) await redisClient.quit()
      },
    },
  ]
}

export type CreateStopHooksFn = typeof createStopHooks
