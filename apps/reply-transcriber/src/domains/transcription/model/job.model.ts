import type { MediaRef } from "./messaging.port"
import type { UpdateKey } from "./update.model"

export type ActiveStage = "download" | "convert" | "transcribe"

export type StageProgress =
  | { kind: "percent"; percent: number; at: Date | null }
  | { kind: "indeterminate"; note: string }

export type JobState =
  | { stage: ActiveStage; progress: StageProgress }
  | { stage: "done" }
  | { stage: "error"; reason: string }

/**
 * - `live`: started by a command or a subscription, opens with an authoritative edit.
 * - `resume`: restarted after a crash, opens with a paced update.
 * - `upgrade`: quietly re-transcribed with the default model, one edit at the end.
 */
export type JobMode = "live" | "resume" | "upgrade"

export type LanguageSelection = {
  /** Language passed to the engine, or `null` for auto-detection. */
  force: string | null
  /** Languages the user listed, when more than one. */
  allowed: string[] | null
}

export type TranscriptionJob = {
  key: UpdateKey
  source: MediaRef
  mode: JobMode
  model: string
  language: LanguageSelection
  timeZone: string
  chatLabel: string
  messageDate: Date | null
}

export type JobOutcome = "completed" | "aborted" | "failed"

export const UNKNOWN_PROGRESS_NOTE = "прогресс неизвестен"

/**
 * Parses a `lang` argument. Empty forces `defaultLanguage`, one code forces
 * that code, several enable auto-detection limited to the list.
 */
export function selectLanguage(value: string | null | undefined, defaultLanguage: string): LanguageSelection {
  const items = (value ?? "")
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0)

  if (items.length === 0) return { force: defaultLanguage, allowed: null }

  const [only] = items
  if (items.length === 1 && only !== undefined) return { force: only, allowed: null }

  return { force: null, allowed: items }
}
