import type { Milliseconds } from "@murmur/clock"
import type { ActiveStage } from "../model/job.model"
import { clipMessageText } from "../model/update.model"

export const PROGRESS_PREFIX = "/transcription 🤖 Транскрипция: "

export const STAGE_LABELS: Record<ActiveStage, { title: string; finishedAt: string }> = {
  download: { title: "Скачивание медиа", finishedAt: "Дата завершения скачивания" },
  convert: { title: "Конвертация медиа", finishedAt: "Дата завершения конвектирования" },
  transcribe: { title: "Извлечение текста", finishedAt: "Дата завершения" },
}

/** Shown in place of a timestamp that is not known yet. */
export const NO_TIMESTAMP = "—"

/** Estimates made before this much of a stage has elapsed are too noisy to show. */
export const MIN_ELAPSED_FOR_ESTIMATE_MS: Milliseconds = 500

/**
 * Time left in a stage, extrapolated linearly from the share already done:
 * `(100 - percent) / percent * elapsed`.
 *
 * `null` while `percent` is zero or less of the stage has elapsed than
 * `MIN_ELAPSED_FOR_ESTIMATE_MS`.
 */
export function estimateRemainingMs(percent: number, elapsedMs: Milliseconds): Milliseconds | null {
  if (percent <= 0 || elapsedMs < MIN_ELAPSED_FOR_ESTIMATE_MS) return null

  return ((100 - percent) / percent) * elapsedMs
}

/**
 * Integer percent of `done` over `total`, capped at 99 so only the explicit
 * end-of-stage update shows 100.
 */
export function stagePercent(done: number, total: number): number {
  if (total <= 0) return 0

  return Math.floor(Math.min(99, Math.max(0, (done / total) * 100)))
}

/**
 * Status line for a running stage. A `note` replaces the percentage, which is
 * how indeterminate progress is shown.
 */
export function renderProgress(
  stage: ActiveStage,
  percent: number | null,
  timestamp: string | null,
  note: string | null,
): string {
  const { title, finishedAt } = STAGE_LABELS[stage]
  const headline = note ? `${title} (${note})` : `${title} ${percent ?? 0}%`
  const text = `${PROGRESS_PREFIX}${headline}\n${finishedAt}: ${timestamp || NO_TIMESTAMP}`

  return clipMessageText(text)
}
