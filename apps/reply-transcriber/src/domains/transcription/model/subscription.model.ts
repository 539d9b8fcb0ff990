import type { MediaKind } from "./messaging.port"

export const SUBSCRIPTION_FLAGS = [
  "subscribe_record_audio",
  "subscribe_record_video",
  "subscribe_audio",
  "subscribe_video",
] as const

export type SubscriptionFlag = (typeof SUBSCRIPTION_FLAGS)[number]

export type Subscription = Record<SubscriptionFlag, boolean> & {
  name?: string
}

/** Keyed by chat id. */
export type Subscriptions = Record<string, Subscription>

export const FLAG_FOR_MEDIA: Record<MediaKind, SubscriptionFlag> = {
  voice: "subscribe_record_audio",
  video_note: "subscribe_record_video",
  audio: "subscribe_audio",
  video: "subscribe_video",
}

export const FLAG_LABELS: Record<SubscriptionFlag, string> = {
  subscribe_record_audio: "голосовые",
  subscribe_record_video: "видеосообщения",
  subscribe_audio: "аудио",
  subscribe_video: "видео",
}

export function emptySubscription(): Subscription {
  return {
    subscribe_record_audio: false,
    subscribe_record_video: false,
    subscribe_audio: false,
    subscribe_video: false,
  }
}

export function hasAnyFlag(subscription: Subscription): boolean {
  return SUBSCRIPTION_FLAGS.some((flag) => subscription[flag])
}

export interface SubscriptionStore {
  /** Saved subscriptions, or none when nothing was saved yet. */
  load(): Promise<Subscriptions>

  save(subscriptions: Subscriptions): Promise<void>
}
