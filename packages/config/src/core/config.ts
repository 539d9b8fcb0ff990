import type { IConfig } from "../ports/config"

export class Config<T extends Record<string, unknown>> implements IConfig<T> {
  constructor(
    private readonly data: Readonly<T>,
    private readonly provenance: Readonly<Record<string, string>>,
    private readonly applied: readonly string[],
    private readonly mergedKeys: ReadonlySet<string>,
  ) {
    Object.freeze(this.data)
  }

  get value(): T {
    return this.data
  }

  explain<K extends keyof T & string>(key: K): string {
    return this.provenance[key] ?? "default"
  }

  sourcesUsed(): string[] {
    return [...this.applied]
  }

  unknownKeys(): string[] {
    return [...this.mergedKeys].filter((key) => !Object.hasOwn(this.data, key))
  }
}
