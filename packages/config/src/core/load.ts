import { type $ZodType, prettifyError, safeParse } from "zod/v4/core"
import { EnvSource } from "../adapters/env/env-source"
import type { IConfig } from "../ports/config"
import type { ConfigSource } from "../ports/source"
import { Config } from "./config"
import { ConfigError } from "./config-error"
import { expandReferences } from "./expand"

export type LoadConfigOptions<T extends Record<string, unknown>> = {
  schema: $ZodType<T>
  sources?: ConfigSource[]

  /**
   * Expand `${NAME}` references between values before validation.
   * `fallbacks` supplies values for names no source provides, usually the
   * schema defaults a reference depends on.
   */
  expandEnv?: boolean
  fallbacks?: Readonly<Record<string, string>>
}

export async function loadConfig<T extends Record<string, unknown>>({
  schema,
  sources,
  expandEnv = false,
  fallbacks,
}: LoadConfigOptions<T>): Promise<IConfig<T>> {
  const merged: Record<string, string> = {}
  const provenance: Record<string, string> = {}
  const applied: string[] = []
  const resolvedSources = sources ?? [new EnvSource()]

  for (const source of resolvedSources) {
    const values = await source.load()
    let contributed = false

    for (const [key, value] of Object.entries(values)) {
      if (value !== undefined) {
        merged[key] = value
        provenance[key] = source.name
        contributed = true
      }
    }

    if (contributed && !applied.includes(source.name)) applied.push(source.name)
  }

  const input = expandEnv ? expandReferences(merged, fallbacks) : merged
  const result = safeParse(schema, input)

  if (!result.success) {
    const keys = result.error.issues.map((issue) => issue.path.map(String).join("."))
    throw ConfigError.invalid(prettifyError(result.error), keys)
  }

  for (const key of Object.keys(result.data)) {
    if (!(key in provenance)) {
      provenance[key] = "default"
    }
  }

  return new Config<T>(result.data, provenance, applied, new Set(Object.keys(merged)))
}
