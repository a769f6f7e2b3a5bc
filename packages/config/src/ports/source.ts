/**
 * A source of raw configuration values.
 *
 * Sources only load; validation, coercion and merging happen in loadConfig.
 * Later sources override earlier ones.
 */
export interface ConfigSource {
  /** Provenance label, e.g. "env" or "dotenv:.env.defaults" */
  readonly name: string

  /**
   * Flat key/value pairs. An `undefined` value means "not provided" and
   * never overrides an earlier source.
   */
  load(): Promise<Record<string, unknown>>
}
