import fs from "node:fs/promises"
import path from "node:path"
import { parse } from "dotenv"
import type { ConfigSource } from "../../ports/source"

export type DotenvSourceOptions = {
  /**
   * Path to the .env file, absolute or relative to `cwd`.
   *
   * @example ".env.production", "secrets/telegram.env"
   */
  file: string

  /** When `false`, a missing file yields no values instead of an error. */
  required: boolean

  /** @default process.cwd() */
  cwd?: string
}

export class DotenvSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: DotenvSourceOptions) {
    this.name = `dotenv:${opts.file}`
  }

  async load(): Promise<Record<string, string | undefined>> {
    const filePath = path.resolve(this.opts.cwd ?? process.cwd(), this.opts.file)

    try {
      return parse(await fs.readFile(filePath, "utf-8"))
    } catch (err) {
      if (!this.opts.required && isMissingFile(err)) return {}

      throw err
    }
  }
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}
