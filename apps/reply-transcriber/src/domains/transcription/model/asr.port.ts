export type AsrEvent =
  | { kind: "language"; language: string; probability: number | null }
  | { kind: "segment"; text: string; startSeconds: number; endSeconds: number }

export type TranscribeRequest = {
  audioPath: string
  model: string
  /** Forced language code, or `null` to auto-detect. */
  language: string | null
  vad: boolean
  signal?: AbortSignal
}

export interface AsrEngine {
  /** Streams recognised segments as they are produced. */
  transcribe(request: TranscribeRequest): AsyncIterable<AsrEvent>
}
