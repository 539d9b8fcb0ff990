import type { ChatId, MessageId } from "./update.model"

export type ResumeClassification = "unfinished" | "inferior"

export type ResumeCandidate = {
  chatId: ChatId
  statusMessageId: MessageId
  sourceMessageId: MessageId
  chatLabel: string
  messageDate: Date
  classification: ResumeClassification
}
