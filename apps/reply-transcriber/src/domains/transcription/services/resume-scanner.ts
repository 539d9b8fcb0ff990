import type { Clock, Milliseconds } from "@murmur/clock"
import type { Logger } from "@murmur/logger"
import { Semaphore } from "../../../lib/semaphore"
import { selectLanguage, type TranscriptionJob } from "../model/job.model"
import type { ChatSummary, MediaRef, MessagingPlatform } from "../model/messaging.port"
import type { ResumeCandidate, ResumeClassification } from "../model/resume.model"
import { UpdateKey } from "../model/update.model"
import type { JobRunner } from "./job-runner"
import { classifyStatusMessage } from "./status-message"
import type { TranscriptionPipeline } from "./transcription-pipeline"

export type ResumeScannerDeps = {
  platform: MessagingPlatform
  runner: JobRunner
  pipeline: TranscriptionPipeline
  clock: Clock
  logger: Logger
}

export type ResumeScannerConfig = {
  defaultModel: string
  defaultLanguage: string
  defaultTimeZone: string
  /** Status messages older than this are left alone. */
  maxAgeMs: Milliseconds
  /** Own messages read per chat, newest first. */
  scanLimit: number
  /** Jobs of each kind allowed to run at once. */
  concurrency: number
  /** Pause after each spawned job. */
  spawnDelayMs: Milliseconds
}

export type ScanSummary = {
  chatsScanned: number
  resumed: number
  upgraded: number
}

const TASK_PREFIX: Record<ResumeClassification, string> = {
  unfinished: "resume",
  inferior: "upgrade",
}

/**
 * Finds status messages left behind by a previous run and puts them back to
 * work: unfinished ones are resumed, transcripts made with a worse model than
 * the current default are redone quietly.
 *
 * Resumed and upgraded jobs are throttled by separate semaphores, so a backlog
 * of upgrades never holds up interrupted jobs.
 */
export class ResumeScanner {
  private readonly logger: Logger

  constructor(
    private readonly deps: ResumeScannerDeps,
    private readonly config: ResumeScannerConfig,
  ) {
    this.logger = deps.logger.child({ module: "resume-scanner" })
  }

  async scan(signal?: AbortSignal): Promise<ScanSummary> {
    const cutoff = this.deps.clock.nowMs() - this.config.maxAgeMs
    this.logger.info("Scanning recent status messages", {
      maxAgeMs: this.config.maxAgeMs,
      concurrency: this.config.concurrency,
    })

    const chats = await this.deps.platform.listChats()
    const candidates: ResumeCandidate[] = []

    for (const chat of chats) {
      if (signal?.aborted) break
      candidates.push(...(await this.collect(chat, cutoff)))
    }

    const resume = candidates.filter((candidate) => candidate.classification === "unfinished")
    const upgrade = candidates.filter((candidate) => candidate.classification === "inferior")
    this.logger.info("Scan found candidates", {
      chatsScanned: chats.length,
      toResume: resume.length,
      toUpgrade: upgrade.length,
    })

    const resumed = await this.schedule(resume, new Semaphore(this.config.concurrency), signal)
    const upgraded = await this.schedule(upgrade, new Semaphore(this.config.concurrency), signal)

    this.logger.info("Scan finished", { resumed, upgraded })

    return { chatsScanned: chats.length, resumed, upgraded }
  }

  /** Candidates in one chat, newest first. Reading stops at the first failure. */
  private async collect(chat: ChatSummary, cutoff: number): Promise<ResumeCandidate[]> {
    const found: ResumeCandidate[] = []

    try {
      const messages = this.deps.platform.listRecentSelfMessages(chat.chatId, this.config.scanLimit)

      for await (const message of messages) {
        if (!message.date || message.date.getTime() < cutoff) break
        if (!message.outgoing || !message.text.trim() || message.replyToId === null) continue

        const classification = classifyStatusMessage(message.text, this.config.defaultModel)
        if (!classification) continue

        found.push({
          chatId: chat.chatId,
          statusMessageId: message.id,
          sourceMessageId: message.replyToId,
          chatLabel: chat.label,
          messageDate: message.date,
          classification,
        })
        this.logger.debug("Candidate found", {
          chatId: chat.chatId,
          chat: chat.label,
          messageId: message.id,
          classification,
        })
      }
    } catch (err) {
      this.logger.warn("Could not read chat history", { chatId: chat.chatId, chat: chat.label, err })
    }

    return found
  }

  private async schedule(
    candidates: ResumeCandidate[],
    semaphore: Semaphore,
    signal?: AbortSignal,
  ): Promise<number> {
    let scheduled = 0

    for (const candidate of candidates) {
      if (signal?.aborted) break

      const fields = {
        chatId: candidate.chatId,
        chat: candidate.chatLabel,
        messageId: candidate.statusMessageId,
      }

      try {
        const source = await this.deps.platform.getMessage(candidate.chatId, candidate.sourceMessageId)
        if (!source?.media) {
          this.logger.debug("Skipping candidate without media", fields)
          continue
        }

        const name = `${TASK_PREFIX[candidate.classification]}_${candidate.chatId}_${candidate.statusMessageId}`
        const job = this.toJob(candidate, source.media)
        const spawned = this.deps.runner.spawn(name, async (jobSignal) => {
          const release = await semaphore.acquire(jobSignal)
          if (!release) return

          try {
            await this.deps.pipeline.run(job, jobSignal)
          } finally {
            release()
          }
        })
        if (!spawned) break

        scheduled++
        this.logger.info("Job scheduled", { ...fields, job: name })
        await this.deps.clock.sleep(this.config.spawnDelayMs, signal)
      } catch (err) {
        this.logger.warn("Could not schedule candidate", { ...fields, err })
      }
    }

    return scheduled
  }

  private toJob(candidate: ResumeCandidate, source: MediaRef): TranscriptionJob {
    return {
      key: UpdateKey.of(candidate.chatId, candidate.statusMessageId),
      source,
      mode: candidate.classification === "unfinished" ? "resume" : "upgrade",
      model: this.config.defaultModel,
      language: selectLanguage(this.config.defaultLanguage, this.config.defaultLanguage),
      timeZone: this.config.defaultTimeZone,
      chatLabel: candidate.chatLabel,
      messageDate: candidate.messageDate,
    }
  }
}
