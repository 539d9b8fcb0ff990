import type { AppConfig } from "../../../app/config"
import type { CoreServices } from "../../../app/services/core"
import type { InfraClients } from "../../../app/services/infra"
import { CommandHandler } from "../commands/command-handler"
import { WhisperCliEngine } from "../infra/asr-engine.whisper-cli"
import { FfmpegTranscoder } from "../infra/media-transcoder.ffmpeg"
import { TelegramPlatform } from "../infra/messaging-platform.telegram"
import { JsonFileSubscriptionStore } from "../infra/subscription-store.json-file"
import { WhisperModelCache } from "../infra/whisper-model-cache"
import type { AsrEngine } from "../model/asr.port"
import type { MessagingPlatform } from "../model/messaging.port"
import type { SubscriptionStore } from "../model/subscription.model"
import type { MediaTranscoder } from "../model/transcoder.port"
import { JobRunner } from "../services/job-runner"
import { ResumeScanner } from "../services/resume-scanner"
import { TranscriptionPipeline } from "../services/transcription-pipeline"
import { UpdateScheduler } from "../services/update-scheduler"

export type TranscriptionServices = {
  platform: MessagingPlatform
  transcoder: MediaTranscoder
  asr: AsrEngine
  subscriptions: SubscriptionStore
  scheduler: UpdateScheduler
  runner: JobRunner
  pipeline: TranscriptionPipeline
  scanner: ResumeScanner
  commands: CommandHandler
}

export function createTranscriptionServices(
  config: AppConfig,
  core: CoreServices,
  infra: InfraClients,
): TranscriptionServices {
  const { clock, logger } = core
  const { transcription, tools, paths, resume } = config

  const platform = new TelegramPlatform({ client: infra.telegram.client, logger })

  const transcoder = new FfmpegTranscoder(
    { runCommand: infra.runCommand, logger },
    { ffmpegPath: tools.ffmpegPath, ffprobePath: tools.ffprobePath },
  )

  const models = new WhisperModelCache({ logger }, { modelDir: paths.modelCacheDir })

  const asr = new WhisperCliEngine(
    { runCommand: infra.runCommand, models, logger },
    {
      cliPath: tools.whisperCliPath,
      threads: tools.whisperThreads,
      vadModel: tools.whisperVadModel,
    },
  )

  const subscriptions = new JsonFileSubscriptionStore({ logger }, { path: paths.subscriptionsFile })

  const scheduler = new UpdateScheduler(
    { platform, clock, logger },
    { intervalMs: transcription.editIntervalMs },
  )

  const runner = new JobRunner({ clock, logger })

  const pipeline = new TranscriptionPipeline(
    { platform, transcoder, asr, scheduler, clock, logger },
    {
      tempDir: paths.tempDir,
      defaultTimeZone: transcription.timeZone,
    },
  )

  const scanner = new ResumeScanner(
    { platform, runner, pipeline, clock, logger },
    {
      defaultModel: transcription.defaultModel,
      defaultLanguage: transcription.defaultLanguage,
      defaultTimeZone: transcription.timeZone,
      maxAgeMs: resume.maxAgeMs,
      scanLimit: resume.scanLimit,
      concurrency: resume.concurrency,
      spawnDelayMs: resume.spawnDelayMs,
    },
  )

  const commands = new CommandHandler(
    { platform, scheduler, runner, pipeline, subscriptions, logger },
    {
      defaultModel: transcription.defaultModel,
      defaultLanguage: transcription.defaultLanguage,
      defaultTimeZone: transcription.timeZone,
    },
  )

  return { platform, transcoder, asr, subscriptions, scheduler, runner, pipeline, scanner, commands }
}
