import type { Logger } from "@murmur/logger"
import { CommandError, type RunCommandFn } from "../../../lib/run-command"
import type { AsrEngine, AsrEvent, TranscribeRequest } from "../model/asr.port"
import { PipelineError } from "../model/transcription.errors"
import type { WhisperModelCache } from "./whisper-model-cache"

export type WhisperCliEngineDeps = {
  runCommand: RunCommandFn
  models: WhisperModelCache
  logger: Logger
}

export type WhisperCliEngineConfig = {
  cliPath: string
  threads: number
  /** Silero VAD weights for `--vad`, resolved through the model cache. */
  vadModel: string
}

const SEGMENT_LINE =
  /^\[(\d{2}):(\d{2}):(\d{2})[.,](\d{3}) --> (\d{2}):(\d{2}):(\d{2})[.,](\d{3})\]\s?(.*)$/
const LANGUAGE_LINE = /auto-detected language:\s*([a-z]{2,3})\s*\(p\s*=\s*([\d.]+)\)/

function toSeconds(h: string, m: string, s: string, ms: string): number {
  return Number(h) * 3600 + Number(m) * 60 + Number(s) + Number(ms) / 1000
}

/** Reads a `[hh:mm:ss.mmm --> hh:mm:ss.mmm]  text` line. */
export function parseSegmentLine(line: string): Extract<AsrEvent, { kind: "segment" }> | null {
  const match = SEGMENT_LINE.exec(line)
  if (!match) return null

  const [, h1 = "0", m1 = "0", s1 = "0", ms1 = "0", h2 = "0", m2 = "0", s2 = "0", ms2 = "0", text = ""] = match
  const body = text.trim()
  if (!body) return null

  return {
    kind: "segment",
    text: ` ${body}`,
    startSeconds: toSeconds(h1, m1, s1, ms1),
    endSeconds: toSeconds(h2, m2, s2, ms2),
  }
}

export function parseLanguageLine(line: string): Extract<AsrEvent, { kind: "language" }> | null {
  const match = LANGUAGE_LINE.exec(line)
  if (!match?.[1]) return null

  const probability = Number.parseFloat(match[2] ?? "")

  return {
    kind: "language",
    language: match[1],
    probability: Number.isFinite(probability) ? probability : null,
  }
}

type RunState = {
  done: boolean
  error: unknown
}

/**
 * Speech recognition through the whisper.cpp command-line tool.
 *
 * Segments are printed to stdout as they are decoded and streamed to the
 * caller; the detected language comes from the tool's log on stderr. Leaving
 * the iteration early kills the process.
 */
export class WhisperCliEngine implements AsrEngine {
  private readonly logger: Logger

  constructor(
    private readonly deps: WhisperCliEngineDeps,
    private readonly config: WhisperCliEngineConfig,
  ) {
    this.logger = deps.logger.child({ module: "whisper-cli" })
  }

  async *transcribe(request: TranscribeRequest): AsyncGenerator<AsrEvent> {
    const modelPath = await this.deps.models.resolve(request.model)
    const vadPath = request.vad ? await this.deps.models.resolveVad(this.config.vadModel) : null
    const args = this.buildArgs(request, modelPath, vadPath)

    const controller = new AbortController()
    const onAbort = () => controller.abort()
    request.signal?.addEventListener("abort", onAbort, { once: true })
    if (request.signal?.aborted) controller.abort()

    const queue: AsrEvent[] = []
    const state: RunState = { done: false, error: undefined }
    let wake: (() => void) | null = null

    const push = (event: AsrEvent) => {
      queue.push(event)
      wake?.()
      wake = null
    }

    this.logger.debug("Starting", { model: request.model, language: request.language ?? "auto" })

    const run = this.deps
      .runCommand({
        command: this.config.cliPath,
        args,
        signal: controller.signal,
        onStdoutLine: (line) => {
          const segment = parseSegmentLine(line)
          if (segment) push(segment)
        },
        onStderrLine: (line) => {
          const language = parseLanguageLine(line)
          if (language) push(language)
        },
      })
      .then(
        () => {
          state.done = true
        },
        (err: unknown) => {
          state.done = true
          state.error = err
        },
      )
      .finally(() => {
        wake?.()
        wake = null
      })

    try {
      while (true) {
        const next = queue.shift()
        if (next) {
          yield next
          continue
        }
        if (state.done) break

        await new Promise<void>((resolve) => {
          wake = resolve
        })
      }

      await run
      if (state.error !== undefined) throw this.toError(request.model, state.error)
    } finally {
      request.signal?.removeEventListener("abort", onAbort)
      controller.abort()
      await run
    }
  }

  private buildArgs(request: TranscribeRequest, modelPath: string, vadPath: string | null): string[] {
    const args = [
      "-m",
      modelPath,
      "-f",
      request.audioPath,
      "-l",
      request.language ?? "auto",
      "-t",
      String(this.config.threads),
    ]

    if (vadPath) args.push("--vad", "--vad-model", vadPath)

    return args
  }

  private toError(model: string, err: unknown): unknown {
    if (err instanceof CommandError && err.code === "command_aborted") return err

    return PipelineError.asrFailed(model, err)
  }
}
