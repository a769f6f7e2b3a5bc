import { ConfigError } from "./config.errors"

// ${NAME} or ${NAME:-fallback}
const REFERENCE = /\$\{([A-Za-z_][A-Za-z0-9_]*)(?::-([^}]*))?\}/g

/**
 * Resolves `${NAME}` references inside string values against the other merged
 * values. Unresolved references without a fallback become "".
 */
export function expandEnv(values: Readonly<Record<string, unknown>>): Record<string, unknown> {
  const resolved = new Map<string, string>()

  const resolve = (key: string, raw: string, chain: readonly string[]): string => {
    const cached = resolved.get(key)
    if (cached !== undefined) return cached

    const expanded = raw.replace(REFERENCE, (_match, name: string, fallback?: string) => {
      if (chain.includes(name)) {
        throw ConfigError.expansionCycle([...chain, name])
      }

      const value = values[name]

      if (typeof value === "string") return resolve(name, value, [...chain, name])
      if (value !== undefined) return String(value)

      return fallback ?? ""
    })

    resolved.set(key, expanded)

    return expanded
  }

  const out: Record<string, unknown> = {}

  for (const [key, value] of Object.entries(values)) {
    out[key] = typeof value === "string" ? resolve(key, value, [key]) : value
  }

  return out
}
