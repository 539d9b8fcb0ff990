import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { DotenvSource } from "../dotenv-source"

describe("DotenvSource behavior", () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "dotenv-source-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true, force: true })
  })

  it("is named after the file", () => {
    expect(new DotenvSource({ file: "secrets/telegram.env", required: false }).name).toBe(
      "dotenv:secrets/telegram.env",
    )
  })

  it("parses quotes and comments", async () => {
    await fs.writeFile(
      path.join(cwd, ".env"),
      ['# comment', 'TELEGRAM_PASSWORD="two words"', "DEFAULT_LANG=ru # trailing"].join("\n"),
    )

    const values = await new DotenvSource({ file: ".env", required: true, cwd }).load()

    expect(values).toEqual({ TELEGRAM_PASSWORD: "two words", DEFAULT_LANG: "ru" })
  })

  it("returns nothing for a missing optional file", async () => {
    const source = new DotenvSource({ file: ".env.missing", required: false, cwd })

    await expect(source.load()).resolves.toEqual({})
  })

  it("fails for a missing required file", async () => {
    const source = new DotenvSource({ file: ".env.missing", required: true, cwd })

    await expect(source.load()).rejects.toMatchObject({ code: "ENOENT" })
  })
})
