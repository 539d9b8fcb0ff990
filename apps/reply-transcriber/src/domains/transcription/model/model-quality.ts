/** Whisper model names from worst to best. */
export const MODEL_ORDER = ["tiny", "base", "small", "medium", "turbo", "large"] as const

export type RankedModel = (typeof MODEL_ORDER)[number]

/** Status messages written before the model was named were produced with this model. */
export const LEGACY_MODEL: RankedModel = "small"

const MODEL_MARKER = /🤖 Транскрипция\s*\(model\s+(\w+)\)\s*:/u

/** Position in `MODEL_ORDER`, or -1 for a name outside it. */
export function modelQualityRank(model: string): number {
  const name = model.trim().toLowerCase()

  return MODEL_ORDER.findIndex((candidate) => candidate === name)
}

/**
 * Model named in a finished transcription message. The legacy marker without
 * a model maps to `LEGACY_MODEL`; text that is not a transcription gives `null`.
 */
export function parseTranscriptionModel(text: string): string | null {
  if (!text.includes("🤖 Транскрипция")) return null

  const match = MODEL_MARKER.exec(text)
  if (match?.[1]) return match[1].trim().toLowerCase()

  if (text.includes("🤖 Транскрипция:") && !text.includes("(model ")) return LEGACY_MODEL

  return null
}

export function isWorseModel(candidate: string, reference: string): boolean {
  const candidateRank = modelQualityRank(candidate)
  const referenceRank = modelQualityRank(reference)

  if (candidateRank < 0 || referenceRank < 0) return false

  return candidateRank < referenceRank
}
