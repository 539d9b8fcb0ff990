import { mkdtemp, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { NullLogger } from "@murmur/logger"
import { afterEach, beforeEach, describe, expect, it } from "vitest"
import { modelFileName, WhisperModelCache } from "../whisper-model-cache"

describe("modelFileName", () => {
  it("maps short names to ggml files", () => {
    expect(modelFileName("small")).toBe("ggml-small.bin")
    expect(modelFileName("turbo")).toBe("ggml-large-v3-turbo.bin")
    expect(modelFileName(" Large ")).toBe("ggml-large-v3.bin")
  })

  it("uses unknown names as they are", () => {
    expect(modelFileName("large-v2")).toBe("ggml-large-v2.bin")
  })
})

describe("WhisperModelCache", () => {
  let dir: string
  let cache: WhisperModelCache

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "whisper-models-test-"))
    cache = new WhisperModelCache({ logger: new NullLogger() }, { modelDir: dir })
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it("resolves a model present in the directory", async () => {
    await writeFile(join(dir, "ggml-large-v3-turbo.bin"), "weights")

    await expect(cache.resolve("turbo")).resolves.toBe(join(dir, "ggml-large-v3-turbo.bin"))
  })

  it("shares one lookup between callers", () => {
    expect(cache.resolve("small")).toBe(cache.resolve("SMALL"))
  })

  it("reports a missing model and looks again next time", async () => {
    await expect(cache.resolve("medium")).rejects.toMatchObject({
      code: "model_missing",
      message: `Model medium not found at ${join(dir, "ggml-medium.bin")}`,
    })

    await writeFile(join(dir, "ggml-medium.bin"), "weights")

    await expect(cache.resolve("medium")).resolves.toBe(join(dir, "ggml-medium.bin"))
  })

  it("finds VAD weights by file name or absolute path", async () => {
    const vad = join(dir, "ggml-silero-v5.1.2.bin")
    await writeFile(vad, "weights")

    await expect(cache.resolveVad("ggml-silero-v5.1.2.bin")).resolves.toBe(vad)
    await expect(cache.resolveVad(vad)).resolves.toBe(vad)
  })

  it("reports missing VAD weights as a missing model", async () => {
    await expect(cache.resolveVad("ggml-silero-v5.1.2.bin")).rejects.toMatchObject({
      code: "model_missing",
      message: `Model vad not found at ${join(dir, "ggml-silero-v5.1.2.bin")}`,
    })
  })
})
