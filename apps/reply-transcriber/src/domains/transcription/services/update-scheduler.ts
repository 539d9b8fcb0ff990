import type { Clock, Milliseconds, UnixMs } from "@murmur/clock"
import type { Logger } from "@murmur/logger"
import type { EditOutcome, MessageEdit, MessagingPlatform } from "../model/messaging.port"
import { MessageEditError } from "../model/transcription.errors"
import { clipMessageText, UpdateKey, type UpdateMeta } from "../model/update.model"

export type UpdateSchedulerDeps = {
  platform: MessagingPlatform
  clock: Clock
  logger: Logger
}

export type UpdateSchedulerConfig = {
  /** Minimum gap between two low-priority edits, across all messages. */
  intervalMs: Milliseconds
}

export type AuthoritativeOptions = {
  meta?: UpdateMeta
  /** Cuts a rate-limit wait short. */
  signal?: AbortSignal
}

export const MIN_INTERVAL_MS: Milliseconds = 1000

type Command =
  | { kind: "request"; key: UpdateKey; text: string; meta: UpdateMeta }
  | { kind: "cancel"; key: UpdateKey }
  | { kind: "forget"; key: UpdateKey }

type PendingEdit = {
  key: UpdateKey
  text: string
  meta: UpdateMeta
}

type SchedulerState = "idle" | "running" | "stopped"

/**
 * Paces and coalesces status-message edits.
 *
 * Low-priority requests are posted to a mailbox and applied by a single loop
 * that owns all pending state: at most one queued edit per message, the latest
 * text wins, and edits go out no closer than `intervalMs` apart. An
 * authoritative edit bypasses the pacing and invalidates whatever is still
 * pending for its message, including an edit the loop already picked up.
 */
export class UpdateScheduler {
  private readonly intervalMs: Milliseconds
  private readonly logger: Logger

  private readonly mailbox: Command[] = []
  private wake: (() => void) | null = null

  private readonly pending = new Map<string, PendingEdit>()
  private queue: string[] = []
  private readonly queued = new Set<string>()
  private readonly cancelled = new Set<string>()

  private inFlight: { id: string; done: Promise<void> } | null = null
  private lastDispatchAt: UnixMs | null = null

  private state: SchedulerState = "idle"
  private stopController = new AbortController()
  private loop: Promise<void> | null = null

  constructor(
    private readonly deps: UpdateSchedulerDeps,
    config: UpdateSchedulerConfig,
  ) {
    this.intervalMs = Math.max(MIN_INTERVAL_MS, config.intervalMs)
    this.logger = deps.logger.child({ module: "update-scheduler" })
  }

  /** Queues `text` for the message, replacing anything still pending for it. */
  requestLowPriority(key: UpdateKey, text: string, meta: UpdateMeta = {}): void {
    this.post({ kind: "request", key, text, meta })
  }

  /** Drops pending text for the message and suppresses an edit already picked up. */
  cancelAndClear(key: UpdateKey): void {
    this.post({ kind: "cancel", key })
  }

  /** Releases the bookkeeping for a message whose job has ended. */
  forget(key: UpdateKey): void {
    this.post({ kind: "forget", key })
  }

  /**
   * Edits the message now, after cancelling its low-priority state and
   * waiting out an edit of the same message that is already on the wire.
   *
   * @throws MessageEditError when the platform rejects the edit.
   */
  async dispatchAuthoritative(
    key: UpdateKey,
    edit: MessageEdit,
    options: AuthoritativeOptions = {},
  ): Promise<void> {
    const { meta = {}, signal } = options
    const id = UpdateKey.format(key)

    this.cancelAndClear(key)

    const inFlight = this.inFlight
    if (inFlight?.id === id) await inFlight.done

    const clipped: MessageEdit = { ...edit, text: clipMessageText(edit.text) }
    const outcome = await this.editWithBackoff(key, clipped, meta, signal)

    switch (outcome.kind) {
      case "edited":
        this.logger.debug("Authoritative edit applied", this.logFields(key, meta))
        return
      case "not_modified":
        this.logger.debug("Authoritative edit left message unchanged", this.logFields(key, meta))
        return
      case "rate_limited":
        throw MessageEditError.rateLimited(key, outcome.retryAfterSeconds)
      case "failed":
        this.logger.warn("Authoritative edit failed", {
          ...this.logFields(key, meta),
          reason: outcome.reason,
          err: outcome.error,
        })
        throw MessageEditError.failed(key, outcome.reason, outcome.error)
    }
  }

  start(): void {
    if (this.state === "running") return

    this.state = "running"
    this.stopController = new AbortController()
    this.loop = this.run(this.stopController.signal).catch((err: unknown) => {
      this.logger.error("Update scheduler loop crashed", { err })
    })

    this.logger.info("Update scheduler started", { intervalMs: this.intervalMs })
  }

  /** Ends the loop. Pending low-priority edits are dropped. */
  async stop(): Promise<void> {
    if (this.state !== "running") return

    this.state = "stopped"
    this.stopController.abort()
    await this.loop

    this.logger.info("Update scheduler stopped", { droppedEdits: this.pending.size })
  }

  private post(command: Command): void {
    if (this.state === "stopped") return

    this.mailbox.push(command)
    this.wake?.()
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      this.drainMailbox()

      const id = this.queue.shift()
      if (id === undefined) {
        await this.waitForMail(signal)
        continue
      }
      this.queued.delete(id)

      await this.paceDispatch(signal)
      if (signal.aborted) return

      // A cancel or a newer text may have arrived during the pacing sleep.
      this.drainMailbox()

      const edit = this.pending.get(id)
      if (!edit) continue
      this.pending.delete(id)

      if (this.cancelled.has(id)) {
        this.cancelled.delete(id)
        this.logger.debug("Skipping cancelled edit", this.logFields(edit.key, edit.meta))
        continue
      }

      await this.dispatchLowPriority(id, edit, signal)
    }
  }

  private drainMailbox(): void {
    for (const command of this.mailbox.splice(0)) {
      const id = UpdateKey.format(command.key)

      switch (command.kind) {
        case "request":
          this.pending.set(id, { key: command.key, text: command.text, meta: command.meta })
          if (!this.queued.has(id)) {
            this.queued.add(id)
            this.queue.push(id)
          }
          break
        case "cancel":
          this.pending.delete(id)
          if (this.queued.delete(id)) {
            this.queue = this.queue.filter((queuedId) => queuedId !== id)
          }
          this.cancelled.add(id)
          break
        case "forget":
          this.cancelled.delete(id)
          break
      }
    }
  }

  private waitForMail(signal: AbortSignal): Promise<void> {
    if (this.mailbox.length > 0 || signal.aborted) return Promise.resolve()

    return new Promise((resolve) => {
      const done = () => {
        signal.removeEventListener("abort", done)
        this.wake = null
        resolve()
      }

      this.wake = done
      signal.addEventListener("abort", done, { once: true })
    })
  }

  private async paceDispatch(signal: AbortSignal): Promise<void> {
    if (this.lastDispatchAt === null) return

    const waitMs = this.intervalMs - (this.deps.clock.nowMs() - this.lastDispatchAt)
    if (waitMs > 0) await this.deps.clock.sleep(waitMs, signal)
  }

  private async dispatchLowPriority(id: string, edit: PendingEdit, signal: AbortSignal): Promise<void> {
    const done = this.editWithBackoff(edit.key, { text: edit.text }, edit.meta, signal).then(
      (outcome) => this.reportLowPriority(edit, outcome),
    )

    this.inFlight = { id, done }
    try {
      await done
    } finally {
      this.inFlight = null
      this.lastDispatchAt = this.deps.clock.nowMs()
    }
  }

  private reportLowPriority(edit: PendingEdit, outcome: EditOutcome): void {
    const fields = this.logFields(edit.key, edit.meta)

    switch (outcome.kind) {
      case "edited":
        this.logger.debug("Progress edit applied", fields)
        return
      case "not_modified":
        this.logger.debug("Progress edit left message unchanged", fields)
        return
      case "rate_limited":
        this.logger.warn("Progress edit dropped, still rate limited", {
          ...fields,
          retryAfterSeconds: outcome.retryAfterSeconds,
        })
        return
      case "failed":
        this.logger.warn("Progress edit dropped", { ...fields, reason: outcome.reason, err: outcome.error })
        return
    }
  }

  /** One attempt, and one retry after the platform's flood wait plus a second. */
  private async editWithBackoff(
    key: UpdateKey,
    edit: MessageEdit,
    meta: UpdateMeta,
    signal?: AbortSignal,
  ): Promise<EditOutcome> {
    const first = await this.attemptEdit(key, edit)
    if (first.kind !== "rate_limited") return first

    this.logger.warn("Edit rate limited, waiting", {
      ...this.logFields(key, meta),
      retryAfterSeconds: first.retryAfterSeconds,
    })

    await this.deps.clock.sleep((first.retryAfterSeconds + 1) * 1000, signal)
    if (signal?.aborted) return first

    return this.attemptEdit(key, edit)
  }

  private async attemptEdit(key: UpdateKey, edit: MessageEdit): Promise<EditOutcome> {
    try {
      return await this.deps.platform.editMessage(key, edit)
    } catch (error) {
      return { kind: "failed", reason: "unknown", error }
    }
  }

  private logFields(key: UpdateKey, meta: UpdateMeta) {
    return {
      chatId: key.chatId,
      chat: meta.chatLabel ?? key.chatId,
      messageId: key.messageId,
      messageDate: meta.messageDate ?? "—",
    }
  }
}
