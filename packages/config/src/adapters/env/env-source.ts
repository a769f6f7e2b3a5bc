import type { ConfigSource } from "../../ports/source"

export type EnvSourceOptions = {
  /** Keep only variables starting with this, and strip it: `STOWAGE_S3_REGION` becomes `S3_REGION`. */
  prefix?: string
  /** Defaults to process.env */
  env?: Record<string, string | undefined>
}

/** Environment variables, read at load() time. Unset variables are omitted. */
export class EnvSource implements ConfigSource {
  readonly name: string

  constructor(private readonly options: EnvSourceOptions = {}) {
    this.name = options.prefix ? `env:${options.prefix}` : "env"
  }

  async load(): Promise<Record<string, string>> {
    const env = this.options.env ?? process.env
    const prefix = this.options.prefix ?? ""
    const values: Record<string, string> = {}

    for (const [key, value] of Object.entries(env)) {
      if (value === undefined || !key.startsWith(prefix)) continue

      values[key.slice(prefix.length)] = value
    }

    return values
  }
}
