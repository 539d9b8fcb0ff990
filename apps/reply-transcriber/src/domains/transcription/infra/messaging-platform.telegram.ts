import type { Logger } from "@murmur/logger"
import bigInt from "big-integer"
import { Api, errors, type TelegramClient, utils } from "telegram"
import { NewMessage, type NewMessageEvent } from "telegram/events"
import type {
  ChatMessage,
  ChatSummary,
  DownloadProgressFn,
  EditOutcome,
  IncomingMessageHandler,
  MediaKind,
  MediaRef,
  MessageEdit,
  MessagingPlatform,
  SendOptions,
} from "../model/messaging.port"
import { PipelineError } from "../model/transcription.errors"
import { type ChatId, clipMessageText, type MessageId, UpdateKey } from "../model/update.model"

export type TelegramPlatformDeps = {
  client: TelegramClient
  logger: Logger
}

/** RPC errors meaning the message can no longer be edited by us. */
const NOT_EDITABLE = new Set([
  "MESSAGE_ID_INVALID",
  "MESSAGE_EDIT_TIME_EXPIRED",
  "MESSAGE_AUTHOR_REQUIRED",
  "CHAT_WRITE_FORBIDDEN",
  "CHAT_ADMIN_REQUIRED",
  "PEER_ID_INVALID",
])

export function classifyEditError(err: unknown): EditOutcome {
  if (err instanceof errors.FloodWaitError) {
    return { kind: "rate_limited", retryAfterSeconds: err.seconds }
  }

  if (err instanceof errors.RPCError) {
    if (err.errorMessage === "MESSAGE_NOT_MODIFIED") return { kind: "not_modified" }
    if (NOT_EDITABLE.has(err.errorMessage)) return { kind: "failed", reason: "not_editable", error: err }
  }

  return { kind: "failed", reason: "unknown", error: err }
}

/** Transcribable kind, checked from the most specific document type. */
export function mediaKindOf(message: Api.Message): MediaKind | null {
  if (message.voice) return "voice"
  if (message.videoNote) return "video_note"
  if (message.audio) return "audio"
  if (message.video) return "video"

  return null
}

export function toMediaRef(chatId: ChatId, message: Api.Message): MediaRef | null {
  if (!message.media || message.media instanceof Api.MessageMediaWebPage) return null

  const size = message.document?.size

  return {
    chatId,
    messageId: message.id,
    kind: mediaKindOf(message),
    sizeBytes: size ? size.toJSNumber() : null,
  }
}

export function toChatMessage(chatId: ChatId, chatLabel: string, message: Api.Message): ChatMessage {
  return {
    chatId,
    id: message.id,
    text: message.message ?? "",
    date: message.date ? new Date(message.date * 1000) : null,
    outgoing: Boolean(message.out),
    replyToId: message.replyToMsgId ?? null,
    media: toMediaRef(chatId, message),
    chatLabel,
  }
}

export function entityLabel(entity: Api.TypeUser | Api.TypeChat): string | null {
  if (entity instanceof Api.User) {
    const name = [entity.firstName, entity.lastName].filter(Boolean).join(" ").trim()
    return name || entity.username || null
  }

  if (entity instanceof Api.Chat || entity instanceof Api.Channel) return entity.title || null

  return null
}

/**
 * MessagingPlatform over a GramJS user client.
 *
 * Chat ids are marked peer ids as decimal strings. Edits never throw for RPC
 * failures; they are classified into outcomes for the scheduler.
 */
export class TelegramPlatform implements MessagingPlatform {
  private readonly logger: Logger
  private readonly names = new Map<ChatId, string>()

  constructor(private readonly deps: TelegramPlatformDeps) {
    this.logger = deps.logger.child({ module: "telegram" })
  }

  async editMessage(key: UpdateKey, edit: MessageEdit): Promise<EditOutcome> {
    const text = clipMessageText(edit.text)

    try {
      await this.deps.client.editMessage(this.peer(key.chatId), {
        message: key.messageId,
        text,
        ...(edit.attachmentPath && { file: edit.attachmentPath }),
        ...(edit.quote && {
          formattingEntities: [
            new Api.MessageEntityBlockquote({
              offset: edit.quote.offset,
              length: edit.quote.length,
              collapsed: true,
            }),
          ],
        }),
      })
      return { kind: "edited" }
    } catch (err) {
      const outcome = classifyEditError(err)
      this.logger.debug("Edit rejected", { chatId: key.chatId, messageId: key.messageId, outcome: outcome.kind })
      return outcome
    }
  }

  async downloadMedia(
    media: MediaRef,
    destPath: string,
    onProgress: DownloadProgressFn,
    signal?: AbortSignal,
  ): Promise<string> {
    const [message] = await this.deps.client.getMessages(this.peer(media.chatId), { ids: [media.messageId] })
    if (!message?.media) throw PipelineError.mediaMissing(media.chatId, media.messageId)

    const progressCallback = Object.assign(
      (downloaded: bigInt.BigInteger, total: bigInt.BigInteger) => {
        const totalBytes = total.toJSNumber()
        onProgress(downloaded.toJSNumber(), totalBytes > 0 ? totalBytes : null)
      },
      { isCanceled: false },
    )
    const onAbort = () => {
      progressCallback.isCanceled = true
    }
    signal?.addEventListener("abort", onAbort, { once: true })

    try {
      const result = await this.deps.client.downloadMedia(message, { outputFile: destPath, progressCallback })
      return typeof result === "string" ? result : ""
    } finally {
      signal?.removeEventListener("abort", onAbort)
    }
  }

  async sendMessage(chatId: ChatId, text: string, options: SendOptions = {}): Promise<ChatMessage> {
    const sent = await this.deps.client.sendMessage(this.peer(chatId), {
      message: text,
      ...(options.replyTo !== undefined && { replyTo: options.replyTo }),
      silent: options.silent ?? false,
    })

    return toChatMessage(chatId, await this.labelFor(chatId), sent)
  }

  async deleteMessage(key: UpdateKey): Promise<void> {
    await this.deps.client.deleteMessages(this.peer(key.chatId), [key.messageId], { revoke: true })
  }

  async getMessage(chatId: ChatId, id: MessageId): Promise<ChatMessage | null> {
    const [message] = await this.deps.client.getMessages(this.peer(chatId), { ids: [id] })
    if (!message || !(message instanceof Api.Message)) return null

    return toChatMessage(chatId, await this.labelFor(chatId), message)
  }

  async listChats(): Promise<ChatSummary[]> {
    const chats: ChatSummary[] = []

    for await (const dialog of this.deps.client.iterDialogs({})) {
      if (!dialog.id) continue

      const chatId = dialog.id.toString()
      const label = dialog.title || dialog.name || chatId
      this.names.set(chatId, label)
      chats.push({ chatId, label })
    }

    return chats
  }

  async *listRecentSelfMessages(chatId: ChatId, limit: number): AsyncGenerator<ChatMessage> {
    const label = await this.labelFor(chatId)

    for await (const message of this.deps.client.iterMessages(this.peer(chatId), { fromUser: "me", limit })) {
      yield toChatMessage(chatId, label, message)
    }
  }

  async resolveChatName(chatId: ChatId): Promise<string | null> {
    const known = this.names.get(chatId)
    if (known) return known

    try {
      const entity = await this.deps.client.getEntity(this.peer(chatId))
      const label = entityLabel(entity)
      if (label) this.names.set(chatId, label)
      return label
    } catch (err) {
      this.logger.debug("Could not resolve chat name", { chatId, err })
      return null
    }
  }

  onMessage(handler: IncomingMessageHandler): () => void {
    const event = new NewMessage({})

    const callback = async (update: NewMessageEvent) => {
      const { message } = update
      const chatId = String(utils.getPeerId(message.peerId))

      try {
        await handler(toChatMessage(chatId, await this.labelFor(chatId), message))
      } catch (err) {
        this.logger.error("Message handler failed", { chatId, messageId: message.id, err })
      }
    }

    this.deps.client.addEventHandler(callback, event)

    return () => this.deps.client.removeEventHandler(callback, event)
  }

  private async labelFor(chatId: ChatId): Promise<string> {
    return (await this.resolveChatName(chatId)) ?? chatId
  }

  private peer(chatId: ChatId): bigInt.BigInteger {
    return bigInt(chatId)
  }
}
