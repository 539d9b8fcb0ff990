import { mkdir, readFile, writeFile } from "node:fs/promises"
import { dirname } from "node:path"
import type { Logger } from "@murmur/logger"
import { prettifyError } from "zod/v4/core"
import { z } from "zod/mini"
import {
  emptySubscription,
  SUBSCRIPTION_FLAGS,
  type Subscription,
  type SubscriptionStore,
  type Subscriptions,
} from "../model/subscription.model"
import { SubscriptionStoreError } from "../model/transcription.errors"

const fileSchema = z.object({
  chats: z._default(z.record(z.string(), z.unknown()), {}),
})

const entrySchema = z.object({
  subscribe_record_audio: z.optional(z.unknown()),
  subscribe_record_video: z.optional(z.unknown()),
  subscribe_audio: z.optional(z.unknown()),
  subscribe_video: z.optional(z.unknown()),
  name: z.optional(z.unknown()),
})

export type JsonFileSubscriptionStoreDeps = {
  logger: Logger
}

export type JsonFileSubscriptionStoreConfig = {
  path: string
}

/**
 * Keeps subscriptions in a JSON file shaped `{ "chats": { "<id>": {...} } }`.
 *
 * Loading is lenient: flags are read by truthiness, entries that are not
 * objects are dropped, and a file that cannot be parsed counts as empty.
 */
export class JsonFileSubscriptionStore implements SubscriptionStore {
  private readonly logger: Logger

  constructor(
    deps: JsonFileSubscriptionStoreDeps,
    private readonly config: JsonFileSubscriptionStoreConfig,
  ) {
    this.logger = deps.logger.child({ module: "subscription-store" })
  }

  async load(): Promise<Subscriptions> {
    let raw: string
    try {
      raw = await readFile(this.config.path, "utf8")
    } catch (err) {
      if (isMissingFile(err)) return {}
      throw err
    }

    try {
      return this.parse(raw)
    } catch (err) {
      this.logger.warn("Ignoring unreadable subscriptions file", { err, path: this.config.path })
      return {}
    }
  }

  async save(subscriptions: Subscriptions): Promise<void> {
    await mkdir(dirname(this.config.path), { recursive: true })
    await writeFile(this.config.path, JSON.stringify({ chats: subscriptions }, null, 2), "utf8")
    this.logger.debug("Subscriptions saved", { chats: Object.keys(subscriptions).length })
  }

  private parse(raw: string): Subscriptions {
    let json: unknown
    try {
      json = JSON.parse(raw)
    } catch (err) {
      throw SubscriptionStoreError.invalidFile(this.config.path, "not valid JSON", err)
    }

    const file = fileSchema.safeParse(json)
    if (!file.success) {
      throw SubscriptionStoreError.invalidFile(this.config.path, prettifyError(file.error))
    }

    const subscriptions: Subscriptions = {}
    for (const [chatId, value] of Object.entries(file.data.chats)) {
      const entry = entrySchema.safeParse(value)
      if (!entry.success) continue

      const subscription: Subscription = emptySubscription()
      for (const flag of SUBSCRIPTION_FLAGS) subscription[flag] = Boolean(entry.data[flag])
      if (typeof entry.data.name === "string") subscription.name = entry.data.name

      subscriptions[chatId] = subscription
    }

    return subscriptions
  }
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}
