/** Percent in 0..100, or `null` while progress cannot be measured. */
export type ConvertProgressFn = (percent: number | null) => void

export interface MediaTranscoder {
  /** Container duration, or `null` when it cannot be probed. */
  probeDurationSeconds(path: string, signal?: AbortSignal): Promise<number | null>

  /** Converts any media file into mono 16 kHz signed 16-bit PCM WAV. */
  convertToPcm(
    inputPath: string,
    outputPath: string,
    onProgress: ConvertProgressFn,
    signal?: AbortSignal,
  ): Promise<void>
}
