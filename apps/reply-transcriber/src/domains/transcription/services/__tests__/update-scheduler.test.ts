import { FakeClock } from "@murmur/clock"
import { NullLogger } from "@murmur/logger"
import { afterEach, beforeEach, describe, expect, it } from "vitest"
import { mock } from "vitest-mock-extended"
import { deferred, flush } from "../../../../tests/async"
import type { Mock } from "../../../../tests/mock"
import type { EditOutcome, MessagingPlatform } from "../../model/messaging.port"
import { MessageEditError } from "../../model/transcription.errors"
import { UpdateKey } from "../../model/update.model"
import { UpdateScheduler } from "../update-scheduler"

type RecordedEdit = { at: number; id: string; text: string }

describe("UpdateScheduler", () => {
  const A = UpdateKey.of("100", 1)
  const B = UpdateKey.of("100", 2)
  const C = UpdateKey.of("200", 3)

  let clock: FakeClock
  let platform: Mock<MessagingPlatform>
  let scheduler: UpdateScheduler
  let edits: RecordedEdit[]

  const texts = () => edits.map((edit) => `${edit.id}=${edit.text}`)

  const makeScheduler = (intervalMs = 1000) =>
    new UpdateScheduler({ platform, clock, logger: new NullLogger() }, { intervalMs })

  beforeEach(() => {
    clock = new FakeClock(0)
    platform = mock<MessagingPlatform>()
    edits = []

    platform.editMessage.mockImplementation(async (key, edit) => {
      edits.push({ at: clock.nowMs(), id: UpdateKey.format(key), text: edit.text })
      return { kind: "edited" }
    })

    scheduler = makeScheduler()
    scheduler.start()
  })

  afterEach(async () => {
    await scheduler.stop()
  })

  describe("coalescing", () => {
    it("dispatches only the latest text requested for a message", async () => {
      scheduler.requestLowPriority(A, "10%")
      scheduler.requestLowPriority(A, "20%")
      scheduler.requestLowPriority(A, "30%")
      await flush()

      expect(edits).toEqual([{ at: 0, id: "100:1", text: "30%" }])
    })

    it("replaces the text of a message that waits for its slot", async () => {
      scheduler.requestLowPriority(A, "a")
      await flush()

      scheduler.requestLowPriority(B, "1%")
      await flush()
      scheduler.requestLowPriority(B, "2%")
      scheduler.requestLowPriority(B, "3%")

      clock.advance(1000)
      await flush()

      expect(texts()).toEqual(["100:1=a", "100:2=3%"])
      expect(platform.editMessage).toHaveBeenCalledTimes(2)
    })
  })

  describe("pacing", () => {
    it("keeps low-priority dispatches at least one interval apart", async () => {
      scheduler.requestLowPriority(A, "a")
      scheduler.requestLowPriority(B, "b")
      scheduler.requestLowPriority(C, "c")
      await flush()
      expect(edits).toHaveLength(1)

      clock.advance(999)
      await flush()
      expect(edits).toHaveLength(1)

      clock.advance(1)
      await flush()
      clock.advance(1000)
      await flush()

      expect(edits.map((edit) => edit.at)).toEqual([0, 1000, 2000])
      expect(texts()).toEqual(["100:1=a", "100:2=b", "200:3=c"])
    })

    it("never paces faster than one second", async () => {
      await scheduler.stop()
      scheduler = makeScheduler(10)
      scheduler.start()

      scheduler.requestLowPriority(A, "a")
      scheduler.requestLowPriority(B, "b")
      await flush()

      clock.advance(10)
      await flush()
      expect(edits).toHaveLength(1)

      clock.advance(990)
      await flush()
      expect(edits.map((edit) => edit.at)).toEqual([0, 1000])
    })

    it("lets authoritative edits bypass the interval", async () => {
      scheduler.requestLowPriority(A, "a")
      await flush()

      await scheduler.dispatchAuthoritative(B, { text: "final", attachmentPath: "/tmp/t.txt" })

      expect(edits.map((edit) => edit.at)).toEqual([0, 0])
      expect(platform.editMessage).toHaveBeenLastCalledWith(B, {
        text: "final",
        attachmentPath: "/tmp/t.txt",
      })
    })
  })

  describe("cancellation", () => {
    it("drops text that was waiting for the pacing slot", async () => {
      scheduler.requestLowPriority(A, "a")
      await flush()
      scheduler.requestLowPriority(B, "b")
      await flush()

      scheduler.cancelAndClear(B)
      clock.advance(1000)
      await flush()

      expect(texts()).toEqual(["100:1=a"])
    })

    it("suppresses text re-requested after a cancel for an edit already picked up", async () => {
      scheduler.requestLowPriority(A, "a")
      await flush()
      scheduler.requestLowPriority(B, "stale")
      await flush()

      scheduler.cancelAndClear(B)
      scheduler.requestLowPriority(B, "newer")
      clock.advance(1000)
      await flush()

      expect(texts()).toEqual(["100:1=a"])

      scheduler.requestLowPriority(B, "later")
      await flush()

      expect(texts()).toEqual(["100:1=a", "100:2=later"])
    })

    it("never applies a queued progress edit after the authoritative edit", async () => {
      scheduler.requestLowPriority(A, "a")
      await flush()
      scheduler.requestLowPriority(B, "50%")
      await flush()

      await scheduler.dispatchAuthoritative(B, { text: "done" })
      clock.advance(5000)
      await flush()

      expect(texts()).toEqual(["100:1=a", "100:2=done"])
    })

    it("waits for an in-flight progress edit of the same message before editing", async () => {
      const gate = deferred<EditOutcome>()
      platform.editMessage.mockImplementationOnce(async (key, edit) => {
        edits.push({ at: clock.nowMs(), id: UpdateKey.format(key), text: edit.text })
        return gate.promise
      })

      scheduler.requestLowPriority(A, "40%")
      await flush()

      const final = scheduler.dispatchAuthoritative(A, { text: "done" })
      await flush()
      expect(texts()).toEqual(["100:1=40%"])

      gate.resolve({ kind: "edited" })
      await final

      expect(texts()).toEqual(["100:1=40%", "100:1=done"])
    })

    it("suppresses the first progress edit after an authoritative edit until forgotten", async () => {
      await scheduler.dispatchAuthoritative(A, { text: "download 0%" })
      scheduler.requestLowPriority(A, "download 5%")
      await flush()

      expect(texts()).toEqual(["100:1=download 0%"])

      await scheduler.dispatchAuthoritative(B, { text: "start" })
      scheduler.forget(B)
      scheduler.requestLowPriority(B, "download 5%")
      await flush()

      expect(texts()).toEqual(["100:1=download 0%", "100:2=start", "100:2=download 5%"])
    })
  })

  describe("transport errors", () => {
    it("retries a rate-limited progress edit once after the wait plus a second", async () => {
      platform.editMessage.mockResolvedValueOnce({ kind: "rate_limited", retryAfterSeconds: 2 })

      scheduler.requestLowPriority(A, "a")
      await flush()
      expect(platform.editMessage).toHaveBeenCalledTimes(1)

      clock.advance(2999)
      await flush()
      expect(platform.editMessage).toHaveBeenCalledTimes(1)

      clock.advance(1)
      await flush()
      expect(texts()).toEqual(["100:1=a"])
      expect(edits[0]?.at).toBe(3000)
    })

    it("drops a failed progress edit and keeps dispatching", async () => {
      platform.editMessage.mockResolvedValueOnce({
        kind: "failed",
        reason: "unknown",
        error: new Error("boom"),
      })
      platform.editMessage.mockRejectedValueOnce(new Error("socket closed"))

      scheduler.requestLowPriority(A, "a")
      scheduler.requestLowPriority(B, "b")
      scheduler.requestLowPriority(C, "c")
      await flush()
      clock.advance(1000)
      await flush()
      clock.advance(1000)
      await flush()

      expect(platform.editMessage).toHaveBeenCalledTimes(3)
      expect(texts()).toEqual(["200:3=c"])
      expect(edits[0]?.at).toBe(2000)
    })

    it("treats an unchanged message as success", async () => {
      platform.editMessage.mockResolvedValueOnce({ kind: "not_modified" })

      await expect(scheduler.dispatchAuthoritative(A, { text: "same" })).resolves.toBeUndefined()
    })

    it("throws a permanent MessageEditError when the target cannot be edited", async () => {
      platform.editMessage.mockResolvedValueOnce({
        kind: "failed",
        reason: "not_editable",
        error: new Error("MESSAGE_ID_INVALID"),
      })

      const error = await scheduler.dispatchAuthoritative(A, { text: "x" }).catch((err: unknown) => err)

      if (!(error instanceof MessageEditError)) throw error
      expect(error.code).toBe("edit_failed")
      expect(error.isPermanent).toBe(true)
    })

    it("throws when an authoritative edit is still rate limited after one retry", async () => {
      platform.editMessage.mockResolvedValue({ kind: "rate_limited", retryAfterSeconds: 1 })

      const result = scheduler.dispatchAuthoritative(A, { text: "x" })
      await flush()
      clock.advance(2000)

      await expect(result).rejects.toMatchObject({ code: "edit_rate_limited" })
      expect(platform.editMessage).toHaveBeenCalledTimes(2)
    })

    it("clips authoritative text to the platform limit", async () => {
      await scheduler.dispatchAuthoritative(A, { text: "x".repeat(5000) })

      expect(edits[0]?.text).toHaveLength(4096)
    })

    it("never splits an emoji at the limit", async () => {
      await scheduler.dispatchAuthoritative(A, { text: `${"x".repeat(4095)}😀y` })

      expect(edits[0]?.text).toBe("x".repeat(4095))
    })
  })

  describe("stop", () => {
    it("ends the loop during a pacing wait without dispatching", async () => {
      scheduler.requestLowPriority(A, "a")
      await flush()
      scheduler.requestLowPriority(B, "b")
      await flush()

      await scheduler.stop()
      clock.advance(5000)
      await flush()

      expect(texts()).toEqual(["100:1=a"])
      expect(clock.pendingSleeps()).toBe(0)
    })

    it("ignores requests after stopping", async () => {
      await scheduler.stop()

      scheduler.requestLowPriority(A, "a")
      await flush()

      expect(platform.editMessage).not.toHaveBeenCalled()
    })

    it("still performs authoritative edits after stopping", async () => {
      await scheduler.stop()

      await scheduler.dispatchAuthoritative(A, { text: "final" })

      expect(texts()).toEqual(["100:1=final"])
    })
  })
})
