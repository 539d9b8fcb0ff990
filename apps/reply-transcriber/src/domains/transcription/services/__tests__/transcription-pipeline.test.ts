import { mkdtemp, readdir, readFile, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { FakeClock } from "@murmur/clock"
import { NullLogger } from "@murmur/logger"
import { afterEach, beforeEach, describe, expect, it } from "vitest"
import { mock } from "vitest-mock-extended"
import { makeMedia } from "../../../../tests/fixtures"
import type { Mock } from "../../../../tests/mock"
import { CommandError } from "../../../../lib/run-command"
import type { AsrEngine, AsrEvent } from "../../model/asr.port"
import type { JobMode, TranscriptionJob } from "../../model/job.model"
import type { MessageEdit, MessagingPlatform } from "../../model/messaging.port"
import type { MediaTranscoder } from "../../model/transcoder.port"
import { MessageEditError } from "../../model/transcription.errors"
import { UpdateKey } from "../../model/update.model"
import { renderProgress } from "../progress-estimator"
import { formatFailure } from "../status-message"
import { TranscriptionPipeline } from "../transcription-pipeline"
import type { UpdateScheduler } from "../update-scheduler"

const START = Date.UTC(2026, 9, 19, 12, 0, 0)
const MOSCOW_START = "2026-10-19 15:00:00 +0300"
const KEY = UpdateKey.of("100", 8)

async function* events(items: AsrEvent[]): AsyncGenerator<AsrEvent> {
  for (const item of items) yield item
}

describe("TranscriptionPipeline", () => {
  let tempDir: string
  let clock: FakeClock
  let platform: Mock<MessagingPlatform>
  let transcoder: Mock<MediaTranscoder>
  let asr: Mock<AsrEngine>
  let scheduler: Mock<UpdateScheduler>
  let pipeline: TranscriptionPipeline
  let controller: AbortController

  const makeJob = (overrides: Partial<TranscriptionJob> = {}): TranscriptionJob => ({
    key: KEY,
    source: makeMedia(),
    mode: "live",
    model: "large",
    language: { force: "ru", allowed: null },
    timeZone: "Europe/Moscow",
    chatLabel: "Test chat",
    messageDate: null,
    ...overrides,
  })

  const lowPriorityTexts = () => scheduler.requestLowPriority.mock.calls.map((call) => call[1])
  const authoritativeEdits = () => scheduler.dispatchAuthoritative.mock.calls.map((call) => call[1])

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), "pipeline-test-"))
    clock = new FakeClock(START)
    platform = mock<MessagingPlatform>()
    transcoder = mock<MediaTranscoder>()
    asr = mock<AsrEngine>()
    scheduler = mock<UpdateScheduler>()
    controller = new AbortController()

    platform.downloadMedia.mockImplementation(async (_media, destPath, onProgress) => {
      onProgress(500, 1000)
      await writeFile(destPath, "media")
      return destPath
    })
    transcoder.convertToPcm.mockImplementation(async (_input, output, onProgress) => {
      onProgress(50)
      await writeFile(output, "wav")
      onProgress(100)
    })
    transcoder.probeDurationSeconds.mockResolvedValue(10)
    asr.transcribe.mockImplementation(() =>
      events([
        { kind: "language", language: "ru", probability: 0.9 },
        { kind: "segment", text: " Привет,", startSeconds: 0, endSeconds: 5 },
        { kind: "segment", text: " мир.", startSeconds: 5, endSeconds: 10 },
      ]),
    )
    scheduler.dispatchAuthoritative.mockResolvedValue(undefined)

    pipeline = new TranscriptionPipeline(
      { platform, transcoder, asr, scheduler, clock, logger: new NullLogger() },
      { tempDir, defaultTimeZone: "Europe/Moscow" },
    )
  })

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true })
  })

  it("names workspaces after the message and the mode", () => {
    const name = (mode: JobMode) => TranscriptionPipeline.workspaceName({ key: KEY, mode })

    expect(name("live")).toBe("job_100_8")
    expect(name("resume")).toBe("job_100_8")
    expect(name("upgrade")).toBe("upgrade_100_8")
  })

  describe("live job", () => {
    it("reports every stage and ends with the quoted transcript", async () => {
      const outcome = await pipeline.run(makeJob(), controller.signal)

      expect(outcome).toBe("completed")
      expect(lowPriorityTexts()).toEqual([
        renderProgress("download", 50, null, null),
        renderProgress("download", 100, MOSCOW_START, null),
        renderProgress("convert", 0, null, null),
        renderProgress("convert", 50, null, null),
        renderProgress("convert", 100, null, null),
        renderProgress("convert", 100, MOSCOW_START, null),
        renderProgress("transcribe", 0, null, null),
        renderProgress("transcribe", 50, null, null),
        renderProgress("transcribe", 99, null, null),
        renderProgress("transcribe", 100, MOSCOW_START, null),
      ])
      expect(authoritativeEdits()).toEqual([
        { text: renderProgress("download", 0, null, null) },
        {
          text: "🤖 Транскрипция (model large):\nПривет, мир.",
          quote: { offset: 31, length: 12 },
        },
      ])
    })

    it("passes the job's language to the engine and always asks for VAD", async () => {
      await pipeline.run(makeJob(), controller.signal)

      expect(asr.transcribe).toHaveBeenCalledWith({
        audioPath: join(tempDir, "job_100_8", "audio.wav"),
        model: "large",
        language: "ru",
        vad: true,
        signal: controller.signal,
      })
    })

    it("removes the workspace and releases the message", async () => {
      await pipeline.run(makeJob(), controller.signal)

      expect(await readdir(tempDir)).toEqual([])
      expect(scheduler.forget).toHaveBeenCalledWith(KEY)
    })

    it("stops silently when the opening edit fails", async () => {
      scheduler.dispatchAuthoritative.mockRejectedValueOnce(
        MessageEditError.failed(KEY, "not_editable", new Error("MESSAGE_ID_INVALID")),
      )

      const outcome = await pipeline.run(makeJob(), controller.signal)

      expect(outcome).toBe("aborted")
      expect(platform.downloadMedia).not.toHaveBeenCalled()
      expect(scheduler.dispatchAuthoritative).toHaveBeenCalledTimes(1)
      expect(await readdir(tempDir)).toEqual([])
    })

    it("stops silently when the final edit fails", async () => {
      scheduler.dispatchAuthoritative
        .mockResolvedValueOnce(undefined)
        .mockRejectedValueOnce(MessageEditError.failed(KEY, "unknown", new Error("boom")))

      const outcome = await pipeline.run(makeJob(), controller.signal)

      expect(outcome).toBe("aborted")
      expect(scheduler.dispatchAuthoritative).toHaveBeenCalledTimes(2)
    })
  })

  describe("resume job", () => {
    it("opens with a paced update instead of an authoritative edit", async () => {
      const outcome = await pipeline.run(makeJob({ mode: "resume" }), controller.signal)

      expect(outcome).toBe("completed")
      expect(lowPriorityTexts()[0]).toBe(renderProgress("download", 0, null, null))
      expect(scheduler.dispatchAuthoritative).toHaveBeenCalledTimes(1)
      expect(authoritativeEdits()[0]?.text).toBe("🤖 Транскрипция (model large):\nПривет, мир.")
    })
  })

  describe("upgrade job", () => {
    it("edits the message once, at the end", async () => {
      const outcome = await pipeline.run(makeJob({ mode: "upgrade" }), controller.signal)

      expect(outcome).toBe("completed")
      expect(scheduler.requestLowPriority).not.toHaveBeenCalled()
      expect(scheduler.dispatchAuthoritative).toHaveBeenCalledTimes(1)
      expect(platform.downloadMedia.mock.calls[0]?.[1]).toBe(join(tempDir, "upgrade_100_8", "source"))
    })
  })

  describe("progress", () => {
    it("shows indeterminate download progress when the size is unknown", async () => {
      platform.downloadMedia.mockImplementation(async (_media, destPath, onProgress) => {
        onProgress(100, null)
        await writeFile(destPath, "media")
        return destPath
      })

      await pipeline.run(makeJob({ source: makeMedia({ sizeBytes: null }) }), controller.signal)

      expect(lowPriorityTexts()[0]).toBe(renderProgress("download", null, null, "прогресс неизвестен"))
    })

    it("pushes download progress only when the percentage changes", async () => {
      platform.downloadMedia.mockImplementation(async (_media, destPath, onProgress) => {
        onProgress(100, 1000)
        onProgress(105, 1000)
        onProgress(200, 1000)
        await writeFile(destPath, "media")
        return destPath
      })

      await pipeline.run(makeJob(), controller.signal)

      expect(lowPriorityTexts().slice(0, 2)).toEqual([
        renderProgress("download", 10, null, null),
        renderProgress("download", 20, null, null),
      ])
    })

    it("predicts the download end from the transfer rate", async () => {
      platform.downloadMedia.mockImplementation(async (_media, destPath, onProgress) => {
        clock.advance(2000)
        onProgress(250, 1000)
        await writeFile(destPath, "media")
        return destPath
      })

      await pipeline.run(makeJob(), controller.signal)

      expect(lowPriorityTexts()[0]).toBe(renderProgress("download", 25, "2026-10-19 15:00:08 +0300", null))
    })

    it("predicts the transcription end from elapsed time", async () => {
      asr.transcribe.mockImplementation(async function* () {
        clock.advance(2000)
        yield { kind: "segment", text: "раз", startSeconds: 0, endSeconds: 2.5 }
      })

      await pipeline.run(makeJob(), controller.signal)

      expect(lowPriorityTexts()).toContain(renderProgress("transcribe", 25, "2026-10-19 15:00:08 +0300", null))
    })

    it("shows indeterminate conversion progress when the duration is unknown", async () => {
      transcoder.convertToPcm.mockImplementation(async (_input, output, onProgress) => {
        onProgress(null)
        await writeFile(output, "wav")
      })

      await pipeline.run(makeJob(), controller.signal)

      expect(lowPriorityTexts()).toContain(renderProgress("convert", null, null, "прогресс неизвестен"))
    })
  })

  describe("final message", () => {
    it("notes a detected language outside the allowed list", async () => {
      asr.transcribe.mockImplementation(() =>
        events([
          { kind: "language", language: "de", probability: 0.8 },
          { kind: "segment", text: " Hallo", startSeconds: 0, endSeconds: 1 },
        ]),
      )

      await pipeline.run(makeJob({ language: { force: null, allowed: ["ru", "en"] } }), controller.signal)

      expect(authoritativeEdits()[1]?.text).toBe(
        "🤖 Транскрипция (model large):\nHallo\n\n[detected_language=de not_in_allowed=ru,en]",
      )
    })

    it("attaches an over-long transcript as a file", async () => {
      const long = "слово ".repeat(1000).trim()
      asr.transcribe.mockImplementation(() =>
        events([{ kind: "segment", text: long, startSeconds: 0, endSeconds: 10 }]),
      )

      const attached: string[] = []
      scheduler.dispatchAuthoritative.mockImplementation(async (_key, edit: MessageEdit) => {
        if (edit.attachmentPath) attached.push(await readFile(edit.attachmentPath, "utf8"))
      })

      const outcome = await pipeline.run(makeJob(), controller.signal)

      expect(outcome).toBe("completed")
      const withFile = authoritativeEdits().filter((edit) => edit.attachmentPath !== undefined)
      expect(withFile).toEqual([
        {
          text: "🤖 Транскрипция (model large):\n(прикреплена файлом)",
          attachmentPath: join(tempDir, "job_100_8", "transcription.txt"),
        },
      ])
      expect(attached).toEqual([long])
      expect(await readdir(tempDir)).toEqual([])
    })
  })

  describe("failures", () => {
    it("reports a conversion failure once and cleans up", async () => {
      const failure = CommandError.failed("ffmpeg", 1, ["Invalid data found when processing input"])
      transcoder.convertToPcm.mockImplementation(async (_input, output) => {
        await writeFile(output, "partial")
        throw failure
      })

      const outcome = await pipeline.run(makeJob({ mode: "resume" }), controller.signal)

      expect(outcome).toBe("failed")
      expect(authoritativeEdits()).toEqual([{ text: formatFailure(failure) }])
      expect(await readdir(tempDir)).toEqual([])
      expect(asr.transcribe).not.toHaveBeenCalled()
    })

    it("reports a download that produced nothing", async () => {
      platform.downloadMedia.mockResolvedValue("")

      const outcome = await pipeline.run(makeJob({ mode: "resume" }), controller.signal)

      expect(outcome).toBe("failed")
      expect(authoritativeEdits()).toEqual([
        {
          text: "🤖 Транскрипция провалена из-за ошибки:\n```\nPipelineError: Не удалось скачать медиа из reply-сообщения\n```",
        },
      ])
    })

    it("ends quietly when the job is cancelled", async () => {
      transcoder.convertToPcm.mockImplementation(async () => {
        controller.abort()
        throw CommandError.aborted("ffmpeg")
      })

      const outcome = await pipeline.run(makeJob({ mode: "resume" }), controller.signal)

      expect(outcome).toBe("aborted")
      expect(scheduler.dispatchAuthoritative).not.toHaveBeenCalled()
      expect(await readdir(tempDir)).toEqual([])
      expect(scheduler.forget).toHaveBeenCalledWith(KEY)
    })
  })
})
