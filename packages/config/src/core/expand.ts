import { ConfigError } from "./config-error"

const REFERENCE = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g

/**
 * Replaces `${NAME}` references in string values with other merged values.
 * A reference may point at a key that itself has references; cycles fail.
 */
export function expandReferences(
  values: Record<string, string>,
  fallbacks: Readonly<Record<string, string>> = {},
): Record<string, string> {
  const resolved: Record<string, string> = {}
  const resolving = new Set<string>()

  const resolve = (key: string): string | undefined => {
    const done = resolved[key]
    if (done !== undefined) return done

    const raw = values[key] ?? fallbacks[key]
    if (raw === undefined) return undefined

    if (resolving.has(key)) throw ConfigError.unresolvedReference(key, key)
    resolving.add(key)

    const expanded = raw.replace(REFERENCE, (_match, reference: string) => {
      const value = resolve(reference)
      if (value === undefined) throw ConfigError.unresolvedReference(key, reference)

      return value
    })

    resolving.delete(key)
    resolved[key] = expanded

    return expanded
  }

  return Object.fromEntries(Object.keys(values).map((key) => [key, resolve(key) ?? ""]))
}
