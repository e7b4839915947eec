import { z } from "zod"
import { EnvSource } from "../../adapters/config/env-source"
import type { ConfigSource } from "../../ports/config-source"
import { logLevelNames } from "../../ports/log-level"
import { ConfigValidationError } from "../errors/errors"

export const serializerConfigSchema = z.object({
  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: z.union([z.boolean(), z.stringbool()]).default(false),
})

export type SerializerConfig = z.infer<typeof serializerConfigSchema>

/**
 * Merges the sources in order, later ones winning, and validates the result.
 * Reads `ENUMJSON_*` environment variables when no source is given. Unknown keys are
 * dropped.
 */
export function loadSerializerConfig(
  sources: readonly ConfigSource[] = [new EnvSource()],
): SerializerConfig {
  const merged: Record<string, unknown> = {}
  const contributing: string[] = []

  for (const source of sources) {
    const entries = Object.entries(source.read()).filter(([, value]) => value !== undefined)
    if (entries.length > 0) contributing.push(source.name)

    for (const [key, value] of entries) merged[key] = value
  }

  const result = serializerConfigSchema.safeParse(merged)
  if (!result.success) {
    throw new ConfigValidationError(z.prettifyError(result.error), contributing)
  }

  return Object.freeze(result.data)
}
