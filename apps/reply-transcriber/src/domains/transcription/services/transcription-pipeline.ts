import { mkdir, rm, writeFile } from "node:fs/promises"
import { join } from "node:path"
import type { Clock, UnixMs } from "@murmur/clock"
import type { Logger } from "@murmur/logger"
import { formatInTimeZone } from "../../../lib/format-in-time-zone"
import type { AsrEngine } from "../model/asr.port"
import {
  type ActiveStage,
  type JobOutcome,
  type JobState,
  type TranscriptionJob,
  UNKNOWN_PROGRESS_NOTE,
} from "../model/job.model"
import type { DownloadProgressFn, MessageEdit, MessagingPlatform } from "../model/messaging.port"
import type { MediaTranscoder } from "../model/transcoder.port"
import { PipelineError } from "../model/transcription.errors"
import { MAX_MESSAGE_LENGTH, type UpdateMeta } from "../model/update.model"
import { estimateRemainingMs, NO_TIMESTAMP, renderProgress, stagePercent } from "./progress-estimator"
import { ATTACHMENT_PLACEHOLDER, composeFinalMessage, formatFailure } from "./status-message"
import type { UpdateScheduler } from "./update-scheduler"

export type TranscriptionPipelineDeps = {
  platform: MessagingPlatform
  transcoder: MediaTranscoder
  asr: AsrEngine
  scheduler: UpdateScheduler
  clock: Clock
  logger: Logger
}

export type TranscriptionPipelineConfig = {
  /** Parent of the per-job workspaces. */
  tempDir: string
  /** Used when a job's time zone is not a valid IANA name. */
  defaultTimeZone: string
}

type JobContext = {
  job: TranscriptionJob
  workspace: string
  signal: AbortSignal
  logger: Logger
  meta: UpdateMeta
  state: JobState
}

/**
 * Runs one job through download, conversion and transcription, keeping the
 * status message up to date and replacing it with the transcript at the end.
 *
 * Every job gets its own workspace directory, removed whatever the outcome.
 * Progress goes through the scheduler as low-priority updates; the opening
 * and closing edits are authoritative. When an authoritative edit fails the
 * message is considered gone and the job stops without reporting.
 */
export class TranscriptionPipeline {
  constructor(
    private readonly deps: TranscriptionPipelineDeps,
    private readonly config: TranscriptionPipelineConfig,
  ) {}

  /** Workspace directory name, also the job's display name in logs. */
  static workspaceName(job: Pick<TranscriptionJob, "key" | "mode">): string {
    const prefix = job.mode === "upgrade" ? "upgrade" : "job"

    return `${prefix}_${job.key.chatId}_${job.key.messageId}`
  }

  async run(job: TranscriptionJob, signal: AbortSignal): Promise<JobOutcome> {
    const name = TranscriptionPipeline.workspaceName(job)
    const messageDate = job.messageDate
      ? formatInTimeZone(job.messageDate, this.config.defaultTimeZone)
      : NO_TIMESTAMP

    const ctx: JobContext = {
      job,
      workspace: join(this.config.tempDir, name),
      signal,
      logger: this.deps.logger.child({
        module: "transcription-pipeline",
        job: name,
        chatId: job.key.chatId,
        chat: job.chatLabel,
        messageId: job.key.messageId,
        messageDate,
      }),
      meta: { chatLabel: job.chatLabel, messageDate },
      state: { stage: "download", progress: { kind: "percent", percent: 0, at: null } },
    }

    ctx.logger.info("Job started", { mode: job.mode, model: job.model })

    try {
      await mkdir(ctx.workspace, { recursive: true })
      const outcome = await this.execute(ctx)
      ctx.logger.info("Job ended", { outcome })
      return outcome
    } catch (err) {
      if (signal.aborted) {
        ctx.logger.warn("Job cancelled", { stage: ctx.state.stage, err })
        return "aborted"
      }

      ctx.state = { stage: "error", reason: err instanceof Error ? err.message : String(err) }
      ctx.logger.error("Job failed", { err })
      await this.tryAuthoritative(ctx, { text: formatFailure(err) })
      return "failed"
    } finally {
      await this.cleanup(ctx)
      this.deps.scheduler.forget(job.key)
    }
  }

  private async execute(ctx: JobContext): Promise<JobOutcome> {
    const { job } = ctx

    if (job.mode === "live") {
      const opened = await this.tryAuthoritative(ctx, {
        text: renderProgress("download", 0, null, null),
      })
      if (!opened) return "aborted"
    } else {
      this.report(ctx, this.percentState("download", 0, null))
    }

    const sourcePath = await this.download(ctx)
    this.ensureActive(ctx)

    const audioPath = await this.convert(ctx, sourcePath)
    this.ensureActive(ctx)

    const transcript = await this.transcribe(ctx, audioPath)
    this.ensureActive(ctx)

    const delivered = await this.deliver(ctx, transcript)
    if (delivered) ctx.state = { stage: "done" }

    return delivered ? "completed" : "aborted"
  }

  private async download(ctx: JobContext): Promise<string> {
    const { job } = ctx
    const startedAt = this.deps.clock.nowMs()
    let lastPercent = -1

    const onProgress: DownloadProgressFn = (bytesDone, totalBytes) => {
      const total = totalBytes && totalBytes > 0 ? totalBytes : job.source.sizeBytes
      if (!total || total <= 0) {
        this.report(ctx, { stage: "download", progress: { kind: "indeterminate", note: UNKNOWN_PROGRESS_NOTE } })
        return
      }

      const percent = stagePercent(bytesDone, total)
      if (percent === lastPercent) return
      lastPercent = percent

      const at = bytesDone > 0 ? this.predictCompletion((bytesDone / total) * 100, startedAt) : null
      this.report(ctx, this.percentState("download", percent, at))
    }

    ctx.logger.debug("Downloading media", { stage: "download" })
    const downloaded = await this.deps.platform.downloadMedia(
      job.source,
      join(ctx.workspace, "source"),
      onProgress,
      ctx.signal,
    )
    if (!downloaded) throw PipelineError.downloadFailed(job.key)

    ctx.logger.debug("Download done", { stage: "download", path: downloaded })
    this.report(ctx, this.percentState("download", 100, this.deps.clock.now()))

    return downloaded
  }

  private async convert(ctx: JobContext, sourcePath: string): Promise<string> {
    const audioPath = join(ctx.workspace, "audio.wav")
    this.report(ctx, this.percentState("convert", 0, null))

    ctx.logger.debug("Converting to wav", { stage: "convert" })
    await this.deps.transcoder.convertToPcm(
      sourcePath,
      audioPath,
      (percent) => {
        if (percent === null) {
          this.report(ctx, { stage: "convert", progress: { kind: "indeterminate", note: UNKNOWN_PROGRESS_NOTE } })
        } else {
          this.report(ctx, this.percentState("convert", percent, null))
        }
      },
      ctx.signal,
    )

    ctx.logger.debug("Conversion done", { stage: "convert" })
    this.report(ctx, this.percentState("convert", 100, this.deps.clock.now()))

    return audioPath
  }

  private async transcribe(ctx: JobContext, audioPath: string): Promise<string> {
    const { job } = ctx
    this.report(ctx, this.percentState("transcribe", 0, null))

    const probed = await this.deps.transcoder.probeDurationSeconds(audioPath, ctx.signal)
    const duration = probed && probed > 0 ? probed : null
    const startedAt = this.deps.clock.nowMs()

    ctx.logger.debug("Transcribing", { stage: "transcribe", model: job.model, durationSeconds: duration })

    const parts: string[] = []
    let detected: string | null = null
    let lastPercent = -1

    const events = this.deps.asr.transcribe({
      audioPath,
      model: job.model,
      language: job.language.force,
      vad: true,
      signal: ctx.signal,
    })

    for await (const event of events) {
      if (event.kind === "language") {
        detected = event.language
        continue
      }

      parts.push(event.text)
      if (duration === null) continue

      const percent = stagePercent(event.endSeconds, duration)
      if (percent === lastPercent) continue
      lastPercent = percent

      this.report(ctx, this.percentState("transcribe", percent, this.predictCompletion(percent, startedAt)))
    }

    let transcript = parts.join("").trim()
    const allowed = job.language.allowed
    if (allowed && detected && !allowed.includes(detected)) {
      transcript = `${transcript}\n\n[detected_language=${detected} not_in_allowed=${allowed.join(",")}]`.trim()
    }

    ctx.logger.debug("Transcription done", { stage: "transcribe", length: transcript.length, language: detected })
    this.report(ctx, this.percentState("transcribe", 100, this.deps.clock.now()))

    return transcript
  }

  private async deliver(ctx: JobContext, transcript: string): Promise<boolean> {
    const { job } = ctx
    const final = composeFinalMessage(transcript, job.model)

    if (final.text.length <= MAX_MESSAGE_LENGTH) {
      ctx.logger.info("Sending transcript inline")
      return this.tryAuthoritative(ctx, { text: final.text, quote: final.quote })
    }

    const attachmentPath = join(ctx.workspace, "transcription.txt")
    await writeFile(attachmentPath, transcript, "utf8")

    ctx.logger.info("Sending transcript as a file", { length: final.text.length })
    return this.tryAuthoritative(ctx, {
      text: composeFinalMessage(ATTACHMENT_PLACEHOLDER, job.model).text,
      attachmentPath,
    })
  }

  /** `false` means the message can no longer be edited and the job should stop. */
  private async tryAuthoritative(ctx: JobContext, edit: MessageEdit): Promise<boolean> {
    try {
      await this.deps.scheduler.dispatchAuthoritative(ctx.job.key, edit, {
        meta: ctx.meta,
        signal: ctx.signal,
      })
      return true
    } catch (err) {
      ctx.logger.info("Message no longer editable, aborting job", { err })
      return false
    }
  }

  private report(ctx: JobContext, state: JobState): void {
    ctx.state = state
    if (ctx.job.mode === "upgrade" || state.stage === "done" || state.stage === "error") return

    const text =
      state.progress.kind === "indeterminate"
        ? renderProgress(state.stage, null, null, state.progress.note)
        : renderProgress(state.stage, state.progress.percent, this.formatTime(ctx, state.progress.at), null)

    this.deps.scheduler.requestLowPriority(ctx.job.key, text, ctx.meta)
  }

  private percentState(stage: ActiveStage, percent: number, at: Date | null): JobState {
    return { stage, progress: { kind: "percent", percent, at } }
  }

  private predictCompletion(percent: number, startedAt: UnixMs): Date | null {
    const now = this.deps.clock.nowMs()
    const remaining = estimateRemainingMs(percent, now - startedAt)

    return remaining === null ? null : new Date(now + remaining)
  }

  private formatTime(ctx: JobContext, at: Date | null): string | null {
    return at ? formatInTimeZone(at, ctx.job.timeZone, this.config.defaultTimeZone) : null
  }

  private ensureActive(ctx: JobContext): void {
    if (ctx.signal.aborted) throw PipelineError.cancelled(ctx.job.key)
  }

  private async cleanup(ctx: JobContext): Promise<void> {
    try {
      await rm(ctx.workspace, { recursive: true, force: true })
      ctx.logger.debug("Workspace removed")
    } catch (err) {
      ctx.logger.warn("Could not remove workspace", { err, path: ctx.workspace })
    }
  }
}
