import type { ConfigSource } from "../../ports/source"

export type EnvSourceOptions = {
  /** Only keys starting with this prefix are read; the prefix is stripped. */
  prefix?: string
  /** @default process.env */
  env?: Record<string, string | undefined>
}

export class EnvSource implements ConfigSource {
  readonly name = "env"
  private readonly prefix: string | undefined
  private readonly env: Record<string, string | undefined>

  constructor(options: EnvSourceOptions = {}) {
    this.prefix = options.prefix
    this.env = options.env ?? process.env
  }

  async load(): Promise<Record<string, string | undefined>> {
    const prefix = this.prefix
    if (!prefix) return { ...this.env }

    return Object.fromEntries(
      Object.entries(this.env)
        .filter(([key]) => key.startsWith(prefix))
        .map(([key, value]) => [key.slice(prefix.length), value]),
    )
  }
}
