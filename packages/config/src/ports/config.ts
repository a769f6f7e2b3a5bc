/**
 * Validated configuration with provenance.
 *
 * @example
 * ```typescript
 * const config = await loadConfig({
 *   schema: z.object({
 *     S3_REGION: z._default(z.string(), "us-east-1"),
 *     UPLOAD_TIMEOUT_MS: z._default(z.coerce.number(), 60_000),
 *   }),
 *   sources: [new DotenvSource({ file: ".env", required: false }), new EnvSource()],
 * })
 *
 * config.get("UPLOAD_TIMEOUT_MS") // 60000
 * config.explain("S3_REGION")     // "dotenv:.env"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  /** Full validated config object */
  readonly value: T

  get<K extends keyof T & string>(key: K): T[K]

  keys(): (keyof T & string)[]

  /**
   * Which source provided the final value for a key: a source name such as
   * "env" or "dotenv:.env", or "default" when the schema filled it in.
   */
  explain<K extends keyof T & string>(key: K): string

  /** Names of all sources that contributed at least one value, plus "default" if used. */
  sourcesUsed(): string[]

  /**
   * Keys present in sources but not defined in the schema.
   * Useful for spotting typos and stale settings.
   */
  unknownKeys(): string[]
}
