import { describeError } from "@murmur/errors"
import type { QuoteRange } from "../model/messaging.port"
import { isWorseModel, parseTranscriptionModel } from "../model/model-quality"
import type { ResumeClassification } from "../model/resume.model"
import { STAGE_LABELS } from "./progress-estimator"

export const ATTACHMENT_PLACEHOLDER = "(прикреплена файлом)"

const FAILURE_HEADER = "🤖 Транскрипция провалена из-за ошибки:"
const MAX_ERROR_DETAIL = 2000

const PENDING_MARKER = "🤖 Транскрипция:"
const MODEL_MARKER = "🤖 Транскрипция (model"
const UNSET_DEADLINE = "Дата завершения: —"
const COMMAND_PREFIXES = ["/transcription", "/tr", "/ts"]
const FINISHED_PREFIX = "🤖 Транскрипция"

export type FinalMessage = {
  text: string
  /** Collapsed quote over the transcript body. JS string lengths are UTF-16 already. */
  quote: QuoteRange
}

export function composeFinalMessage(transcript: string, model: string): FinalMessage {
  const header = `🤖 Транскрипция (model ${model}):\n`
  const body = transcript.trim() || " "

  return {
    text: header + body,
    quote: { offset: header.length, length: body.length },
  }
}

/** Error text shown in place of the transcript. */
export function formatFailure(err: unknown): string {
  return `${FAILURE_HEADER}\n\`\`\`\n${describeError(err, MAX_ERROR_DETAIL)}\n\`\`\``
}

/** Same frame as `formatFailure`, for a plain explanation. */
export function formatFailureText(detail: string): string {
  return `${FAILURE_HEADER}\n\`\`\`\n${detail}\n\`\`\``
}

export function startsWithTranscriptionCommand(text: string): boolean {
  const trimmed = text.trim()

  return COMMAND_PREFIXES.some((prefix) => trimmed.startsWith(prefix))
}

export function isTranscriptionStatus(text: string): boolean {
  return text.includes(PENDING_MARKER) || text.includes(MODEL_MARKER)
}

function mentionsStage(text: string): boolean {
  return Object.values(STAGE_LABELS).some(({ title }) => text.includes(title))
}

export function isUnfinishedStatus(text: string): boolean {
  if (!text.includes(PENDING_MARKER)) return false

  return mentionsStage(text) || text.includes(UNSET_DEADLINE) || text.includes("%")
}

export function isInferiorCompletedStatus(text: string, defaultModel: string): boolean {
  if (!text.includes("🤖 Транскрипция")) return false
  if (mentionsStage(text) || text.includes(UNSET_DEADLINE)) return false

  const model = parseTranscriptionModel(text)
  if (model === null) return false

  return isWorseModel(model, defaultModel)
}

/**
 * Decides whether an own status message needs more work after a restart.
 * Returns `null` for anything that is not a transcription status or needs none.
 *
 * Progress messages keep the command prefix; a finished transcript replaces
 * the whole text, so it starts with the transcript header instead.
 */
export function classifyStatusMessage(text: string, defaultModel: string): ResumeClassification | null {
  const trimmed = text.trim()
  const ownStatus = startsWithTranscriptionCommand(trimmed) || trimmed.startsWith(FINISHED_PREFIX)
  if (!ownStatus || !isTranscriptionStatus(trimmed)) return null

  if (isUnfinishedStatus(trimmed)) return "unfinished"
  if (isInferiorCompletedStatus(trimmed, defaultModel)) return "inferior"

  return null
}
