import { z } from "zod"
import { EnvSource } from "../adapters/env/env-source"
import { ObjectSource } from "../adapters/object/object-source"
import type { ConfigSource } from "../ports/config-source"
import { ConfigError } from "./config-error"
import { type BinaryConfig, type BinaryConfigInput, binaryConfigSchema } from "./schema"

export type LoadBinaryConfigOptions = {
  /** Defaults to `process.env`, read under the `REPR_` prefix. */
  env?: Record<string, string | undefined>

  /** Applied last, keyed like the environment without its prefix. */
  overrides?: Partial<BinaryConfigInput>

  /** Replaces the env and override sources entirely. */
  sources?: ConfigSource[]
}

export async function loadBinaryConfig(
  options: LoadBinaryConfigOptions = {},
): Promise<BinaryConfig> {
  const sources = options.sources ?? [
    new EnvSource({ ...(options.env && { env: options.env }) }),
    ...(options.overrides ? [new ObjectSource(options.overrides)] : []),
  ]

  const merged: Record<string, unknown> = {}

  for (const source of sources) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value !== undefined) merged[key] = value
    }
  }

  const result = binaryConfigSchema.safeParse(merged)

  if (!result.success) {
    throw ConfigError.invalid(
      z.prettifyError(result.error),
      sources.map((source) => source.name),
    )
  }

  return result.data
}
