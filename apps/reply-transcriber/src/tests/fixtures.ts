import type { ChatMessage, MediaRef } from "../domains/transcription/model/messaging.port"

export function makeMedia(overrides: Partial<MediaRef> = {}): MediaRef {
  return {
    chatId: "100",
    messageId: 7,
    kind: "voice",
    sizeBytes: 1000,
    ...overrides,
  }
}

export function makeMessage(overrides: Partial<ChatMessage> = {}): ChatMessage {
  return {
    chatId: "100",
    id: 8,
    text: "",
    date: new Date(Date.UTC(2026, 9, 19, 12, 0, 0)),
    outgoing: true,
    replyToId: null,
    media: null,
    chatLabel: "Test chat",
    ...overrides,
  }
}

/** Async iterable over a fixed list, the shape the platform returns message history in. */
export async function* iterate<T>(items: T[]): AsyncGenerator<T> {
  for (const item of items) yield item
}
