import type { Logger } from "@murmur/logger"
import { CommandError, type RunCommandFn } from "../../../lib/run-command"
import type { ConvertProgressFn, MediaTranscoder } from "../model/transcoder.port"
import { stagePercent } from "../services/progress-estimator"

export type FfmpegTranscoderDeps = {
  runCommand: RunCommandFn
  logger: Logger
}

export type FfmpegTranscoderConfig = {
  ffmpegPath: string
  ffprobePath: string
}

export type FfmpegProgress = { kind: "time"; seconds: number } | { kind: "end" }

/**
 * Reads one line of `-progress` output. `out_time_ms` is in microseconds
 * despite its name.
 */
export function parseFfmpegProgressLine(line: string): FfmpegProgress | null {
  if (line.startsWith("out_time_ms=")) {
    const micros = Number.parseInt(line.slice("out_time_ms=".length), 10)
    return Number.isFinite(micros) ? { kind: "time", seconds: micros / 1_000_000 } : null
  }

  if (line.startsWith("progress=") && line.endsWith("end")) return { kind: "end" }

  return null
}

export class FfmpegTranscoder implements MediaTranscoder {
  private readonly logger: Logger

  constructor(
    private readonly deps: FfmpegTranscoderDeps,
    private readonly config: FfmpegTranscoderConfig,
  ) {
    this.logger = deps.logger.child({ module: "ffmpeg" })
  }

  async probeDurationSeconds(path: string, signal?: AbortSignal): Promise<number | null> {
    try {
      const result = await this.deps.runCommand({
        command: this.config.ffprobePath,
        args: ["-v", "error", "-show_entries", "format=duration", "-of", "default=noprint_wrappers=1:nokey=1", path],
        signal,
      })

      const duration = Number.parseFloat(result.stdout[0] ?? "")
      if (!Number.isFinite(duration)) {
        this.logger.debug("Duration not reported", { path, output: result.stdout })
        return null
      }

      return duration
    } catch (err) {
      if (!(err instanceof CommandError) || err.code === "command_aborted") throw err

      this.logger.debug("Duration probe failed", { path, err })
      return null
    }
  }

  async convertToPcm(
    inputPath: string,
    outputPath: string,
    onProgress: ConvertProgressFn,
    signal?: AbortSignal,
  ): Promise<void> {
    const duration = await this.probeDurationSeconds(inputPath, signal)
    const known = duration !== null && duration > 0 ? duration : null
    if (known === null) onProgress(null)

    let lastPercent = -1
    await this.deps.runCommand({
      command: this.config.ffmpegPath,
      args: [
        "-hide_banner",
        "-loglevel",
        "error",
        "-y",
        "-i",
        inputPath,
        "-vn",
        "-acodec",
        "pcm_s16le",
        "-ar",
        "16000",
        "-ac",
        "1",
        outputPath,
        "-progress",
        "pipe:1",
        "-nostats",
      ],
      signal,
      onStdoutLine: (line) => {
        const progress = parseFfmpegProgressLine(line)
        if (!progress) return

        if (progress.kind === "end") {
          onProgress(100)
          return
        }

        if (known === null) return
        const percent = stagePercent(progress.seconds, known)
        if (percent === lastPercent) return
        lastPercent = percent
        onProgress(percent)
      },
    })

    this.logger.debug("Converted", { inputPath, outputPath, durationSeconds: known })
  }
}
