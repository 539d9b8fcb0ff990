import { mkdir, readFile, writeFile } from "node:fs/promises"
import { join } from "node:path"
import { stdin, stdout } from "node:process"
import { createInterface } from "node:readline/promises"
import type { Logger } from "@murmur/logger"
import { TelegramClient } from "telegram"
import { LogLevel } from "telegram/extensions/Logger"
import { StringSession } from "telegram/sessions"

export type TelegramSessionDeps = {
  logger: Logger
}

export type TelegramSessionConfig = {
  apiId: number
  apiHash: string
  phone: string
  /** Two-step verification password. Prompted for when empty. */
  password: string
  sessionDir: string
  sessionName: string
}

export type PromptFn = (question: string) => Promise<string>

export const promptStdin: PromptFn = async (question) => {
  const rl = createInterface({ input: stdin, output: stdout })

  try {
    return (await rl.question(question)).trim()
  } finally {
    rl.close()
  }
}

export function sessionFilePath(config: Pick<TelegramSessionConfig, "sessionDir" | "sessionName">): string {
  return join(config.sessionDir, `${config.sessionName}.session`)
}

/** Saved string session, or an empty one on first run. */
export async function readSession(path: string): Promise<string> {
  try {
    return (await readFile(path, "utf8")).trim()
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return ""
    throw err
  }
}

/**
 * A GramJS user client whose string session lives in
 * `<sessionDir>/<sessionName>.session`. The first login asks for the code
 * on the terminal; the session is written back after every successful login.
 */
export class TelegramSession {
  private readonly logger: Logger

  private constructor(
    readonly client: TelegramClient,
    private readonly session: StringSession,
    private readonly path: string,
    private readonly config: TelegramSessionConfig,
    private readonly prompt: PromptFn,
    deps: TelegramSessionDeps,
  ) {
    this.logger = deps.logger.child({ module: "telegram-session" })
  }

  static async open(
    deps: TelegramSessionDeps,
    config: TelegramSessionConfig,
    prompt: PromptFn = promptStdin,
  ): Promise<TelegramSession> {
    const path = sessionFilePath(config)
    const session = new StringSession(await readSession(path))
    const client = new TelegramClient(session, config.apiId, config.apiHash, { connectionRetries: 5 })
    client.setLogLevel(LogLevel.WARN)

    return new TelegramSession(client, session, path, config, prompt, deps)
  }

  async connect(): Promise<void> {
    this.logger.info("Connecting", { session: this.config.sessionName })

    await this.client.start({
      phoneNumber: this.config.phone,
      phoneCode: () => this.prompt("Telegram login code: "),
      password: async () => this.config.password || this.prompt("Two-step verification password: "),
      onError: (err) => {
        this.logger.error("Login failed", { err })
      },
    })

    await mkdir(this.config.sessionDir, { recursive: true })
    await writeFile(this.path, this.session.save(), { encoding: "utf8", mode: 0o600 })

    this.logger.info("Connected", { session: this.config.sessionName })
  }

  async disconnect(): Promise<void> {
    await this.client.disconnect()
    this.logger.info("Disconnected")
  }
}
