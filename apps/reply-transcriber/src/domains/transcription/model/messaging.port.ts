import type { ChatId, MessageId, UpdateKey } from "./update.model"

export type MediaKind = "voice" | "video_note" | "audio" | "video"

export type MediaRef = {
  chatId: ChatId
  messageId: MessageId
  /** `null` for media that is none of the transcribable kinds (photos, stickers, documents). */
  kind: MediaKind | null
  sizeBytes: number | null
}

export type ChatMessage = {
  chatId: ChatId
  id: MessageId
  text: string
  date: Date | null
  outgoing: boolean
  replyToId: MessageId | null
  media: MediaRef | null
  chatLabel: string
}

export type ChatSummary = {
  chatId: ChatId
  label: string
}

/** A collapsed quote block, in UTF-16 code units. */
export type QuoteRange = {
  offset: number
  length: number
}

export type MessageEdit = {
  text: string
  attachmentPath?: string
  quote?: QuoteRange
}

export type EditFailureReason = "not_editable" | "unknown"

export type EditOutcome =
  | { kind: "edited" }
  | { kind: "not_modified" }
  | { kind: "rate_limited"; retryAfterSeconds: number }
  | { kind: "failed"; reason: EditFailureReason; error: unknown }

export type DownloadProgressFn = (bytesDone: number, totalBytes: number | null) => void

export type SendOptions = {
  replyTo?: MessageId
  silent?: boolean
}

export type IncomingMessageHandler = (message: ChatMessage) => Promise<void>

export interface MessagingPlatform {
  /** Never throws for transport errors; they come back as `rate_limited` or `failed`. */
  editMessage(key: UpdateKey, edit: MessageEdit): Promise<EditOutcome>

  downloadMedia(
    media: MediaRef,
    destPath: string,
    onProgress: DownloadProgressFn,
    signal?: AbortSignal,
  ): Promise<string>

  sendMessage(chatId: ChatId, text: string, options?: SendOptions): Promise<ChatMessage>

  deleteMessage(key: UpdateKey): Promise<void>

  getMessage(chatId: ChatId, id: MessageId): Promise<ChatMessage | null>

  listChats(): Promise<ChatSummary[]>

  /** Own messages in a chat, newest first, at most `limit`. */
  listRecentSelfMessages(chatId: ChatId, limit: number): AsyncIterable<ChatMessage>

  resolveChatName(chatId: ChatId): Promise<string | null>

  /** Registers a handler for new messages in any chat. Returns an unsubscribe function. */
  onMessage(handler: IncomingMessageHandler): () => void
}
