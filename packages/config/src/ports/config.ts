/**
 * Validated configuration plus provenance for each key.
 *
 * @example
 * ```ts
 * const config = await loadConfig({
 *   schema: z.object({ TEMP_DIR: z._default(z.string(), "./.tmp") }),
 *   sources: [new DotenvSource({ file: ".env", required: false }), new EnvSource()],
 * })
 *
 * config.value.TEMP_DIR      // "./.tmp"
 * config.explain("TEMP_DIR") // "default"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  readonly value: T

  /** Name of the source that supplied `key`, or "default" when the schema filled it in. */
  explain<K extends keyof T & string>(key: K): string

  /** Names of the sources that supplied at least one value, in load order. */
  sourcesUsed(): string[]

  /** Keys seen in sources that the schema does not know. Handy for spotting typos. */
  unknownKeys(): string[]
}
