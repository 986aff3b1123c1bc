/**
 * A source of raw configuration values.
 *
 * Sources only load; validation and coercion happen once, after every source
 * has been merged. Later sources override earlier ones.
 */
export interface ConfigSource {
  /** Used in error messages, e.g. "env" or "object:overrides". */
  readonly name: string

  /** `undefined` for a key means "not provided". */
  load(): Promise<Record<string, unknown>>
}
