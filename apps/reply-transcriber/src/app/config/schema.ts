import type { Milliseconds } from "@murmur/clock"
import { type LogLevelName, logLevelNames } from "@murmur/logger"
import { z } from "zod/mini"

const requiredString = () => z.string().check(z.trim(), z.minLength(1))
const positiveNumber = () => z.coerce.number().check(z.positive())
const positiveInt = () => z.coerce.number().check(z.multipleOf(1), z.positive())

export const envSchema = z.object({
  APP_ENV: z._default(z.string(), "development"),
  SERVICE_NAME: z._default(z.string(), "reply-transcriber"),

  LOG_LEVEL: z._default(z.enum(logLevelNames), "info"),
  LOG_PRETTY: z._default(z.stringbool(), false),

  DEFAULT_MODEL_NAME: z._default(requiredString(), "large"),
  DEFAULT_LANG: z._default(requiredString(), "ru"),
  TZ: z._default(requiredString(), "Europe/Moscow"),

  LOW_PRIORITY_EDIT_INTERVAL_SECONDS: z._default(z.coerce.number().check(z.minimum(1)), 120),
  STOP_GRACE_PERIOD: z._default(z.coerce.number().check(z.nonnegative()), 3500),
  STARTUP_TIMEOUT_MS: z._default(positiveNumber(), 120_000),

  TEMP_DIR: z._default(requiredString(), "./.tmp"),
  MODEL_CACHE_DIR: z._default(requiredString(), "./.models"),
  SESSION_DIR: z._default(requiredString(), "./.session"),
  TR_SUBSCRIPTIONS_FILE: z.optional(requiredString()),

  RESUME_MAX_AGE_DAYS: z._default(positiveNumber(), 7),
  RESUME_CONCURRENCY: z._default(positiveInt(), 3),
  RESUME_SCAN_LIMIT: z._default(positiveInt(), 200),
  RESUME_SPAWN_DELAY_MS: z._default(z.coerce.number().check(z.nonnegative()), 100),

  FFMPEG_PATH: z._default(requiredString(), "ffmpeg"),
  FFPROBE_PATH: z._default(requiredString(), "ffprobe"),
  WHISPER_CLI_PATH: z._default(requiredString(), "whisper-cli"),
  WHISPER_THREADS: z._default(positiveInt(), 4),
  WHISPER_VAD_MODEL: z._default(requiredString(), "ggml-silero-v5.1.2.bin"),

  TELEGRAM_API_ID: positiveInt(),
  TELEGRAM_API_HASH: requiredString(),
  TELEGRAM_PHONE: requiredString(),
  TELEGRAM_SESSION_NAME: requiredString(),
  TELEGRAM_PASSWORD: z._default(z.string(), ""),
})

export type EnvConfig = z.infer<typeof envSchema>

/** Values `${NAME}` references may use when no source sets them. */
export const referenceFallbacks = {
  SESSION_DIR: "./.session",
  TEMP_DIR: "./.tmp",
  MODEL_CACHE_DIR: "./.models",
} as const

export type AppConfig = {
  app: {
    env: string
  }

  logging: {
    level: LogLevelName
    prettify: boolean
    serviceName: string
  }

  lifecycle: {
    startupTimeoutMs: Milliseconds
    /** How long running jobs may keep going after shutdown begins. */
    stopGracePeriodMs: Milliseconds
  }

  paths: {
    tempDir: string
    modelCacheDir: string
    sessionDir: string
    subscriptionsFile: string
  }

  transcription: {
    defaultModel: string
    defaultLanguage: string
    timeZone: string
    editIntervalMs: Milliseconds
  }

  resume: {
    maxAgeMs: Milliseconds
    concurrency: number
    scanLimit: number
    spawnDelayMs: Milliseconds
  }

  tools: {
    ffmpegPath: string
    ffprobePath: string
    whisperCliPath: string
    whisperThreads: number
    /** Enables voice activity detection when set. */
    whisperVadModel: string
  }

  telegram: {
    apiId: number
    apiHash: string
    phone: string
    password: string
    sessionName: string
  }
}
