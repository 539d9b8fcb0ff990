/**
 * Loads raw configuration values. No validation, coercion or merging happens
 * here; `loadConfig` applies sources in order and later ones win.
 */
export interface ConfigSource {
  /** Provenance label, e.g. "env" or "dotenv:secrets/telegram.env". */
  readonly name: string

  /** Flat key/value pairs. An `undefined` value means "not provided". */
  load(): Promise<Record<string, string | undefined>>
}
