import { access } from "node:fs/promises"
import { isAbsolute, join } from "node:path"
import type { Logger } from "@murmur/logger"
import { PipelineError } from "../model/transcription.errors"

export type WhisperModelCacheDeps = {
  logger: Logger
}

export type WhisperModelCacheConfig = {
  modelDir: string
}

/** ggml file stems for the model names users type. Anything else is used as the stem itself. */
const MODEL_FILES: Readonly<Record<string, string>> = {
  tiny: "tiny",
  base: "base",
  small: "small",
  medium: "medium",
  turbo: "large-v3-turbo",
  large: "large-v3",
}

export function modelFileName(model: string): string {
  const name = model.trim().toLowerCase()

  return `ggml-${MODEL_FILES[name] ?? name}.bin`
}

/**
 * Resolves model names to ggml files in `modelDir`, checking each file once.
 * Concurrent lookups of the same file share one check.
 */
export class WhisperModelCache {
  private readonly resolved = new Map<string, Promise<string>>()
  private readonly logger: Logger

  constructor(
    deps: WhisperModelCacheDeps,
    private readonly config: WhisperModelCacheConfig,
  ) {
    this.logger = deps.logger.child({ module: "whisper-model-cache" })
  }

  resolve(model: string): Promise<string> {
    const name = model.trim().toLowerCase()

    return this.lookup(name, join(this.config.modelDir, modelFileName(name)))
  }

  /** VAD weights, given as a file name inside `modelDir` or an absolute path. */
  resolveVad(file: string): Promise<string> {
    const name = file.trim()

    return this.lookup("vad", isAbsolute(name) ? name : join(this.config.modelDir, name))
  }

  private lookup(model: string, path: string): Promise<string> {
    const cached = this.resolved.get(path)
    if (cached) return cached

    const found = this.locate(model, path)
    this.resolved.set(path, found)
    void found.catch(() => this.resolved.delete(path))

    return found
  }

  private async locate(model: string, path: string): Promise<string> {
    try {
      await access(path)
    } catch {
      throw PipelineError.modelMissing(model, path)
    }

    this.logger.info("Model resolved", { model, path })
    return path
  }
}
