/** Telegram peer id as a decimal string. Channel and supergroup ids are negative. */
export type ChatId = string

export type MessageId = number

/** Identifies one editable status message. Also the identity of the job that owns it. */
export type UpdateKey = Readonly<{
  chatId: ChatId
  messageId: MessageId
}>

export const UpdateKey = {
  of(chatId: ChatId, messageId: MessageId): UpdateKey {
    return { chatId, messageId }
  },

  format(key: UpdateKey): string {
    return `${key.chatId}:${key.messageId}`
  },
}

/** Display data carried alongside an update for log lines. */
export type UpdateMeta = {
  chatLabel?: string
  messageDate?: string
}

/** Platform limit on message text length. */
export const MAX_MESSAGE_LENGTH = 4096

/** Cuts `text` to at most `limit` UTF-16 units without splitting a surrogate pair. */
export function clipMessageText(text: string, limit: number = MAX_MESSAGE_LENGTH): string {
  if (text.length <= limit) return text

  const last = text.charCodeAt(limit - 1)
  const end = last >= 0xd800 && last <= 0xdbff ? limit - 1 : limit

  return text.slice(0, end)
}
