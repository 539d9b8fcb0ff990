import { BaseError } from "@murmur/errors"
import type { EditFailureReason } from "./messaging.port"
import { UpdateKey } from "./update.model"

export type MessageEditErrorCode = "edit_failed" | "edit_rate_limited"

export class MessageEditError extends BaseError<MessageEditErrorCode> {
  /** The target message is gone or can no longer be edited. */
  get isPermanent(): boolean {
    return this.context.reason === "not_editable"
  }

  static failed(key: UpdateKey, reason: EditFailureReason, cause: unknown): MessageEditError {
    return new MessageEditError(`Could not edit message ${UpdateKey.format(key)}`, {
      code: "edit_failed",
      context: { chatId: key.chatId, messageId: key.messageId, reason },
      cause,
    })
  }

  static rateLimited(key: UpdateKey, retryAfterSeconds: number): MessageEditError {
    return new MessageEditError(
      `Edit of ${UpdateKey.format(key)} still rate limited after waiting, retry in ${retryAfterSeconds}s`,
      {
        code: "edit_rate_limited",
        context: { chatId: key.chatId, messageId: key.messageId, retryAfterSeconds },
        isRetryable: true,
      },
    )
  }
}

export type PipelineErrorCode =
  | "download_failed"
  | "media_missing"
  | "asr_failed"
  | "model_missing"
  | "job_cancelled"

export class PipelineError extends BaseError<PipelineErrorCode> {
  static downloadFailed(key: UpdateKey, cause?: unknown): PipelineError {
    return new PipelineError("Не удалось скачать медиа из reply-сообщения", {
      code: "download_failed",
      context: { chatId: key.chatId, messageId: key.messageId },
      cause,
    })
  }

  static mediaMissing(chatId: string, messageId: number): PipelineError {
    return new PipelineError(`Message ${chatId}:${messageId} has no media`, {
      code: "media_missing",
      context: { chatId, messageId },
    })
  }

  static asrFailed(model: string, cause: unknown): PipelineError {
    return new PipelineError(`Speech recognition with model ${model} failed`, {
      code: "asr_failed",
      context: { model },
      cause,
    })
  }

  static modelMissing(model: string, path: string): PipelineError {
    return new PipelineError(`Model ${model} not found at ${path}`, {
      code: "model_missing",
      context: { model, path },
    })
  }

  static cancelled(key: UpdateKey): PipelineError {
    return new PipelineError(`Job ${UpdateKey.format(key)} was cancelled`, {
      code: "job_cancelled",
      context: { chatId: key.chatId, messageId: key.messageId },
    })
  }
}

export type SubscriptionStoreErrorCode = "invalid_subscriptions_file"

export class SubscriptionStoreError extends BaseError<SubscriptionStoreErrorCode> {
  static invalidFile(path: string, details: string, cause?: unknown): SubscriptionStoreError {
    return new SubscriptionStoreError(`Subscriptions file ${path} is invalid: ${details}`, {
      code: "invalid_subscriptions_file",
      context: { path },
      cause,
    })
  }
}
