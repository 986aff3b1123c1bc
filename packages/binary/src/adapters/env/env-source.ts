import type { ConfigSource } from "../../ports/config-source"

export const DEFAULT_ENV_PREFIX = "REPR_"

export type EnvSourceOptions = {
  prefix?: string
  env?: Record<string, string | undefined>
}

/**
 * Environment variables under `prefix`, with the prefix stripped from each key.
 */
export class EnvSource implements ConfigSource {
  readonly name = "env"
  private readonly prefix: string
  private readonly env: Record<string, string | undefined>

  constructor(options: EnvSourceOptions = {}) {
    this.prefix = options.prefix ?? DEFAULT_ENV_PREFIX
    this.env = options.env ?? process.env
  }

  async load(): Promise<Record<string, unknown>> {
    const filtered: Record<string, string | undefined> = {}

    for (const [key, value] of Object.entries(this.env)) {
      if (key.startsWith(this.prefix)) {
        filtered[key.slice(this.prefix.length)] = value
      }
    }

    return filtered
  }
}
