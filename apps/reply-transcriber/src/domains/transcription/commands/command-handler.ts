import type { Logger } from "@murmur/logger"
import { selectLanguage, type TranscriptionJob } from "../model/job.model"
import type { ChatMessage, MessagingPlatform } from "../model/messaging.port"
import {
  emptySubscription,
  FLAG_FOR_MEDIA,
  FLAG_LABELS,
  hasAnyFlag,
  SUBSCRIPTION_FLAGS,
  type Subscription,
  type Subscriptions,
  type SubscriptionStore,
} from "../model/subscription.model"
import { UpdateKey, type UpdateMeta } from "../model/update.model"
import type { JobRunner } from "../services/job-runner"
import { renderProgress } from "../services/progress-estimator"
import { formatFailureText } from "../services/status-message"
import type { TranscriptionPipeline } from "../services/transcription-pipeline"
import type { UpdateScheduler } from "../services/update-scheduler"
import { parseCommand, type TranscribeCommand, updatesSubscription } from "./parse-command"

export type CommandHandlerDeps = {
  platform: MessagingPlatform
  scheduler: UpdateScheduler
  runner: JobRunner
  pipeline: TranscriptionPipeline
  subscriptions: SubscriptionStore
  logger: Logger
}

export type CommandHandlerConfig = {
  defaultModel: string
  defaultLanguage: string
  defaultTimeZone: string
}

export const HELP_TEXT = `🤖 Помощь по командам: /tr, /ts, /transcription — три команды, делают одно и то же.

Команды (reply на медиа): /tr, /ts, /transcription

Параметры (key=value):
• model — модель Whisper (tiny, large, turbo…). По умолчанию: large
• lang — язык (ru, en или ru,en). По умолчанию: ru
• tz — таймзона для дат (Europe/Moscow и т.д.). По умолчанию: из env

Подписки и опции (для /tr, /ts, /transcription):
• subscribe=True — подписать чат на все типы медиа (авто /tr на каждое новое медиа)
• subscribe=False — отписать чат
• subscribe_record_audio=True/False — голосовые сообщения
• subscribe_record_video=True/False — видеосообщения
• subscribe_audio=True/False — музыка/аудио
• subscribe_video=True/False — видео
• destruct_message=True — не транскрибировать, удалить отправленное сообщение (удобно для подписки)
• help=True — эта справка (без транскрипции)
• /tr_show_list — список чатов с подпиской (format=text | format=json, по умолчанию text)
• /tr_show_tasks — текущие задания (транскрипция, апгрейд, scheduler и т.д.)`

export const NOT_A_REPLY_TEXT = formatFailureText("Команда должна быть reply на сообщение с медиа")

const LIST_TITLE = "Чаты с подпиской на авто-транскрипцию:"
const TASKS_TITLE = "Текущие задания:"

export function renderSubscriptionList(subscriptions: Subscriptions): string {
  const ids = Object.keys(subscriptions)
  if (ids.length === 0) return `${LIST_TITLE}\n\n(пусто)`

  const sortKey = (id: string) => (subscriptions[id]?.name ?? "").toLowerCase()
  const sorted = [...ids].sort((a, b) => {
    const left = sortKey(a)
    const right = sortKey(b)
    return left < right ? -1 : left > right ? 1 : 0
  })

  const lines = [LIST_TITLE, ""]
  for (const id of sorted) {
    const subscription = subscriptions[id]
    if (!subscription) continue

    const active = SUBSCRIPTION_FLAGS.filter((flag) => subscription[flag]).map((flag) => FLAG_LABELS[flag])
    lines.push(`• ${subscription.name || "(без названия)"} (id=${id})`)
    lines.push(`  Режим: ${active.length > 0 ? active.join(", ") : "—"}`)
    lines.push("")
  }

  return lines.join("\n").trim()
}

export function renderSubscriptionJson(subscriptions: Subscriptions): string {
  return JSON.stringify({ chats: subscriptions }, null, 2)
}

export function renderTaskList(names: string[]): string {
  if (names.length === 0) return `${TASKS_TITLE}\n\n(нет)`

  return [TASKS_TITLE, "", ...names.map((name) => `• ${name}`)].join("\n")
}

/** `subscribe` first, then the individual flags on top. */
export function mergeSubscription(
  current: Subscription | undefined,
  command: TranscribeCommand,
  name: string,
): Subscription {
  const next: Subscription = { ...emptySubscription(), ...current }

  if (command.subscribe !== null) {
    for (const flag of SUBSCRIPTION_FLAGS) next[flag] = command.subscribe
  }
  for (const flag of SUBSCRIPTION_FLAGS) {
    const value = command.flags[flag]
    if (value !== undefined) next[flag] = value
  }
  next.name = name

  return next
}

/**
 * Reacts to new messages: commands in our own outgoing messages, and media
 * arriving in subscribed chats. Transcriptions run as background jobs.
 */
export class CommandHandler {
  private readonly logger: Logger
  private subscriptions: Subscriptions = {}
  private unsubscribe: (() => void) | null = null

  constructor(
    private readonly deps: CommandHandlerDeps,
    private readonly config: CommandHandlerConfig,
  ) {
    this.logger = deps.logger.child({ module: "command-handler" })
  }

  async loadSubscriptions(): Promise<void> {
    this.subscriptions = await this.deps.subscriptions.load()
    this.logger.info("Subscriptions loaded", { chats: Object.keys(this.subscriptions).length })
  }

  /** Starts receiving new messages from the platform. */
  listen(): void {
    if (this.unsubscribe) return

    this.unsubscribe = this.deps.platform.onMessage((message) => this.handle(message))
    this.logger.info("Listening for commands")
  }

  stopListening(): void {
    this.unsubscribe?.()
    this.unsubscribe = null
  }

  /** Entry point for every new message. Nothing is handled once shutdown began. */
  async handle(message: ChatMessage): Promise<void> {
    if (!this.deps.runner.isAccepting) return

    if (message.outgoing) await this.handleOutgoing(message)
    else await this.handleIncoming(message)
  }

  private async handleOutgoing(message: ChatMessage): Promise<void> {
    const command = parseCommand(message.text)
    if (!command) return

    const key = UpdateKey.of(message.chatId, message.id)
    const meta = this.meta(message)
    this.logger.info("Command received", {
      chatId: message.chatId,
      chat: message.chatLabel,
      messageId: message.id,
      command: command.kind === "transcribe" ? command.name : command.kind,
    })

    if (command.kind === "show_list") {
      await this.fillMissingNames()
      const text =
        command.format === "json"
          ? renderSubscriptionJson(this.subscriptions)
          : renderSubscriptionList(this.subscriptions)
      await this.reply(key, text, meta)
      return
    }

    if (command.kind === "show_tasks") {
      await this.reply(key, renderTaskList(this.deps.runner.list()), meta)
      return
    }

    if (command.help) {
      await this.reply(key, HELP_TEXT, meta)
      return
    }

    const subscriptionChanged = updatesSubscription(command)
    if (subscriptionChanged) await this.updateSubscription(message, command)

    if (command.destructMessage) {
      await this.destruct(key, meta)
      return
    }

    if (message.replyToId === null) {
      if (!subscriptionChanged) await this.reply(key, NOT_A_REPLY_TEXT, meta)
      return
    }

    const source = await this.deps.platform.getMessage(message.chatId, message.replyToId)
    if (!source?.media) {
      this.logger.debug("Reply target has no media", { chatId: message.chatId, messageId: message.id })
      return
    }

    this.spawn(`transcription_${message.chatId}_${message.id}`, {
      key,
      source: source.media,
      mode: "live",
      model: command.model ?? this.config.defaultModel,
      language: selectLanguage(command.lang, this.config.defaultLanguage),
      timeZone: command.tz ?? this.config.defaultTimeZone,
      chatLabel: message.chatLabel,
      messageDate: message.date,
    })
  }

  private async handleIncoming(message: ChatMessage): Promise<void> {
    const subscription = this.subscriptions[message.chatId]
    if (!subscription || !hasAnyFlag(subscription)) return

    const kind = message.media?.kind
    if (!message.media || !kind || !subscription[FLAG_FOR_MEDIA[kind]]) return

    const fields = { chatId: message.chatId, chat: message.chatLabel, messageId: message.id }

    try {
      const sent = await this.deps.platform.sendMessage(message.chatId, renderProgress("download", 0, null, null), {
        replyTo: message.id,
        silent: true,
      })
      this.logger.debug("Progress message sent", { ...fields, statusMessageId: sent.id, kind })

      this.spawn(`subscription_transcription_${message.chatId}_${sent.id}`, {
        key: UpdateKey.of(message.chatId, sent.id),
        source: message.media,
        mode: "live",
        model: this.config.defaultModel,
        language: selectLanguage(this.config.defaultLanguage, this.config.defaultLanguage),
        timeZone: this.config.defaultTimeZone,
        chatLabel: message.chatLabel,
        messageDate: sent.date,
      })
    } catch (err) {
      this.logger.warn("Could not start subscription job", { ...fields, err })
    }
  }

  private spawn(name: string, job: TranscriptionJob): void {
    const spawned = this.deps.runner.spawn(name, async (signal) => {
      await this.deps.pipeline.run(job, signal)
    })

    if (spawned) this.logger.info("Transcription queued", { job: name, model: job.model })
  }

  private async updateSubscription(message: ChatMessage, command: TranscribeCommand): Promise<void> {
    const next = mergeSubscription(this.subscriptions[message.chatId], command, message.chatLabel)
    const updated = { ...this.subscriptions }

    if (hasAnyFlag(next)) updated[message.chatId] = next
    else delete updated[message.chatId]

    this.subscriptions = updated
    await this.deps.subscriptions.save(updated)
    this.logger.info("Subscription updated", { chatId: message.chatId, chat: message.chatLabel, active: hasAnyFlag(next) })
  }

  private async fillMissingNames(): Promise<void> {
    let changed = false

    for (const [chatId, subscription] of Object.entries(this.subscriptions)) {
      if (subscription.name?.trim()) continue

      const name = await this.deps.platform.resolveChatName(chatId)
      if (!name) continue

      this.subscriptions = { ...this.subscriptions, [chatId]: { ...subscription, name } }
      changed = true
    }

    if (changed) await this.deps.subscriptions.save(this.subscriptions)
  }

  private async destruct(key: UpdateKey, meta: UpdateMeta): Promise<void> {
    try {
      await this.deps.platform.deleteMessage(key)
      this.logger.debug("Command message deleted", { chatId: key.chatId, messageId: key.messageId, ...meta })
    } catch (err) {
      this.logger.warn("Could not delete command message", { chatId: key.chatId, messageId: key.messageId, err })
    }
  }

  /** Edits the answer into the command message. No job owns the key, so it is released here. */
  private async reply(key: UpdateKey, text: string, meta: UpdateMeta): Promise<void> {
    try {
      await this.deps.scheduler.dispatchAuthoritative(key, { text }, { meta })
    } catch (err) {
      this.logger.warn("Could not answer command", { chatId: key.chatId, messageId: key.messageId, err })
    } finally {
      this.deps.scheduler.forget(key)
    }
  }

  private meta(message: ChatMessage): UpdateMeta {
    return { chatLabel: message.chatLabel }
  }
}
