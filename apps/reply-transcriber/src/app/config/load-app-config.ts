import { join } from "node:path"
import type { Milliseconds } from "@murmur/clock"
import { type ConfigSource, DotenvSource, EnvSource, loadConfig } from "@murmur/config"
import { applyOverrides, type DeepPartial } from "../../lib/apply-overrides"
import { type AppConfig, type EnvConfig, envSchema, referenceFallbacks } from "./schema"

const DAY_MS: Milliseconds = 24 * 60 * 60 * 1000

export function mapEnvToConfig(env: EnvConfig): AppConfig {
  return {
    app: {
      env: env.APP_ENV,
    },
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
      serviceName: env.SERVICE_NAME,
    },
    lifecycle: {
      startupTimeoutMs: env.STARTUP_TIMEOUT_MS,
      stopGracePeriodMs: env.STOP_GRACE_PERIOD * 1000,
    },
    paths: {
      tempDir: env.TEMP_DIR,
      modelCacheDir: env.MODEL_CACHE_DIR,
      sessionDir: env.SESSION_DIR,
      subscriptionsFile: env.TR_SUBSCRIPTIONS_FILE ?? join(env.SESSION_DIR, "tr_subscriptions.json"),
    },
    transcription: {
      defaultModel: env.DEFAULT_MODEL_NAME,
      defaultLanguage: env.DEFAULT_LANG,
      timeZone: env.TZ,
      editIntervalMs: env.LOW_PRIORITY_EDIT_INTERVAL_SECONDS * 1000,
    },
    resume: {
      maxAgeMs: env.RESUME_MAX_AGE_DAYS * DAY_MS,
      concurrency: env.RESUME_CONCURRENCY,
      scanLimit: env.RESUME_SCAN_LIMIT,
      spawnDelayMs: env.RESUME_SPAWN_DELAY_MS,
    },
    tools: {
      ffmpegPath: env.FFMPEG_PATH,
      ffprobePath: env.FFPROBE_PATH,
      whisperCliPath: env.WHISPER_CLI_PATH,
      whisperThreads: env.WHISPER_THREADS,
      whisperVadModel: env.WHISPER_VAD_MODEL,
    },
    telegram: {
      apiId: env.TELEGRAM_API_ID,
      apiHash: env.TELEGRAM_API_HASH,
      phone: env.TELEGRAM_PHONE,
      password: env.TELEGRAM_PASSWORD,
      sessionName: env.TELEGRAM_SESSION_NAME,
    },
  }
}

/** Only the keys the schema knows, so unrelated variables never take part in `${NAME}` expansion. */
function knownKeys(env: NodeJS.ProcessEnv): Record<string, string | undefined> {
  return Object.fromEntries(Object.keys(envSchema.shape).map((key) => [key, env[key]]))
}

export async function loadAppConfig(
  env: NodeJS.ProcessEnv,
  overrides?: DeepPartial<AppConfig>,
  cwd: string = process.cwd(),
): Promise<AppConfig> {
  const appEnv = env.APP_ENV ?? "development"

  const sources: ConfigSource[] = [
    new DotenvSource({ file: `.env.${appEnv}`, required: false, cwd }),
    new DotenvSource({ file: "secrets/telegram.env", required: false, cwd }),
    new EnvSource({ env: knownKeys(env) }),
  ]

  const result = await loadConfig({
    schema: envSchema,
    sources,
    expandEnv: true,
    fallbacks: referenceFallbacks,
  })

  const config = mapEnvToConfig(result.value)

  return overrides ? applyOverrides(config, overrides) : config
}
