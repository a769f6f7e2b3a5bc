import { type $ZodType, prettifyError, safeParse } from "zod/v4/core"
import { EnvSource } from "../adapters/env/env-source"
import type { IConfig } from "../ports/config"
import type { ConfigSource } from "../ports/source"
import { Config } from "./config"
import { ConfigError } from "./config.errors"
import { expandEnv } from "./expand-env"

export type LoadConfigOptions<T extends Record<string, unknown>> = {
  /** Any zod schema, classic or `zod/mini`. */
  schema: $ZodType<T>
  /** Applied in order, later wins. Default: `[new EnvSource()]` */
  sources?: ConfigSource[]
  /** Resolve `${NAME}` references after merging. Default: false */
  expandEnv?: boolean
}

export async function loadConfig<T extends Record<string, unknown>>({
  schema,
  sources,
  expandEnv: expand = false,
}: LoadConfigOptions<T>): Promise<IConfig<T>> {
  const merged: Record<string, unknown> = {}
  const provenance: Record<string, string> = {}
  const resolvedSources = sources ?? [new EnvSource()]

  for (const source of resolvedSources) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value !== undefined) {
        merged[key] = value
        provenance[key] = source.name
      }
    }
  }

  const input = expand ? expandEnv(merged) : merged
  const result = safeParse(schema, input)

  if (!result.success) {
    throw ConfigError.validationFailed(prettifyError(result.error), result.error.issues.length)
  }

  for (const key of Object.keys(result.data)) {
    if (!(key in provenance)) {
      provenance[key] = "default"
    }
  }

  return new Config<T>(result.data, provenance, new Set(Object.keys(merged)))
}
