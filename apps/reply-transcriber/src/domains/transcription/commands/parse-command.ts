import { shellSplit } from "../../../lib/shell-split"
import { SUBSCRIPTION_FLAGS, type SubscriptionFlag } from "../model/subscription.model"

export const TRANSCRIBE_COMMANDS = ["/tr", "/ts", "/transcription"] as const

export type TranscribeCommandName = (typeof TRANSCRIBE_COMMANDS)[number]

export type ListFormat = "text" | "json"

export type TranscribeCommand = {
  kind: "transcribe"
  name: TranscribeCommandName
  model: string | null
  lang: string | null
  tz: string | null
  /** `true` or `false` sets every flag; `null` leaves them. */
  subscribe: boolean | null
  /** Individual flags, applied after `subscribe`. */
  flags: Partial<Record<SubscriptionFlag, boolean>>
  destructMessage: boolean
  help: boolean
}

export type ParsedCommand =
  | { kind: "show_list"; format: ListFormat }
  | { kind: "show_tasks" }
  | TranscribeCommand

const TRUE_WORDS = new Set(["true", "1", "yes", "on"])
const FALSE_WORDS = new Set(["false", "0", "no", "off"])

/** `null` for anything that is not a recognised boolean word. */
export function parseBool(value: string): boolean | null {
  const word = value.trim().toLowerCase()
  if (TRUE_WORDS.has(word)) return true
  if (FALSE_WORDS.has(word)) return false

  return null
}

function isSubscriptionFlag(key: string): key is SubscriptionFlag {
  return SUBSCRIPTION_FLAGS.some((flag) => flag === key)
}

function isTranscribeCommand(name: string): name is TranscribeCommandName {
  return TRANSCRIBE_COMMANDS.some((command) => command === name)
}

/** `key=value` words, keys lower-cased. Words without `=` are skipped. */
function keyValues(words: string[]): [string, string][] {
  const pairs: [string, string][] = []

  for (const word of words) {
    const eq = word.indexOf("=")
    if (eq < 0) continue
    pairs.push([word.slice(0, eq).trim().toLowerCase(), word.slice(eq + 1).trim()])
  }

  return pairs
}

function safeSplit(text: string): string[] | null {
  try {
    return shellSplit(text)
  } catch {
    return null
  }
}

function parseShowList(text: string): ParsedCommand {
  let format: ListFormat = "text"

  for (const [key, value] of keyValues(safeSplit(text)?.slice(1) ?? [])) {
    const lowered = value.toLowerCase()
    if (key === "format" && (lowered === "text" || lowered === "json")) format = lowered
  }

  return { kind: "show_list", format }
}

/** `/tr@my_bot` names the same command as `/tr`. */
function commandName(word: string): TranscribeCommandName | null {
  const name = word.split("@", 1)[0] ?? ""

  return isTranscribeCommand(name) ? name : null
}

/**
 * Parses an outgoing message as a command. Returns `null` for ordinary text
 * and for command lines whose quoting cannot be split.
 */
export function parseCommand(text: string): ParsedCommand | null {
  const trimmed = text.trim()
  if (!trimmed) return null

  if (trimmed.startsWith("/tr_show_tasks")) return { kind: "show_tasks" }
  if (trimmed.startsWith("/tr_show_list")) return parseShowList(trimmed)
  if (!TRANSCRIBE_COMMANDS.some((command) => trimmed.startsWith(command))) return null

  const words = safeSplit(trimmed)
  const [first, ...rest] = words ?? []
  const name = first ? commandName(first) : null
  if (!name) return null

  const command: TranscribeCommand = {
    kind: "transcribe",
    name,
    model: null,
    lang: null,
    tz: null,
    subscribe: null,
    flags: {},
    destructMessage: false,
    help: false,
  }

  for (const [key, value] of keyValues(rest)) {
    if (key === "model") command.model = value || null
    else if (key === "lang") command.lang = value || null
    else if (key === "tz") command.tz = value || null
    else if (key === "subscribe") command.subscribe = parseBool(value)
    else if (key === "destruct_message") command.destructMessage = parseBool(value) === true
    else if (key === "help") command.help = parseBool(value) === true
    else if (isSubscriptionFlag(key)) {
      const flag = parseBool(value)
      if (flag === null) delete command.flags[key]
      else command.flags[key] = flag
    }
  }

  return command
}

/** Whether the command changes the chat's subscription at all. */
export function updatesSubscription(command: TranscribeCommand): boolean {
  return command.subscribe !== null || Object.keys(command.flags).length > 0
}
