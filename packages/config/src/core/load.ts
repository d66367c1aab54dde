import { z } from "zod/mini"
import { EnvSource } from "../adapters/env/env-source"
import type { ConfigSource } from "../ports/source"
import { ConfigError } from "./config-error"

export type LoadConfigOptions<T extends Record<string, unknown>> = {
  schema: z.ZodMiniType<T>

  /** @default [new EnvSource()] */
  sources?: ConfigSource[]
}

/**
 * Merge all sources in order (later ones win), then validate the result
 * against `schema`.
 *
 * @example
 * ```ts
 * const config = await loadConfig({
 *   schema: z.object({ PORT: z._default(z.coerce.number(), 3000) }),
 *   sources: [new DotenvSource({ file: ".env", required: false }), new EnvSource()],
 * })
 *
 * config.PORT // 3000
 * ```
 *
 * @throws {ConfigError} when a source fails to load or validation fails
 */
export async function loadConfig<T extends Record<string, unknown>>({
  schema,
  sources,
}: LoadConfigOptions<T>): Promise<Readonly<T>> {
  const merged: Record<string, string> = {}

  for (const source of sources ?? [new EnvSource()]) {
    const values = await loadSource(source)

    for (const [key, value] of Object.entries(values)) {
      if (value !== undefined) merged[key] = value
    }
  }

  const result = schema.safeParse(merged)

  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.map(String).join("."),
      message: issue.message,
    }))

    throw ConfigError.invalid(z.prettifyError(result.error), issues)
  }

  return Object.freeze(result.data)
}

async function loadSource(source: ConfigSource): Promise<Record<string, string | undefined>> {
  try {
    return await source.load()
  } catch (err) {
    throw ConfigError.unreadable(source.name, err)
  }
}
