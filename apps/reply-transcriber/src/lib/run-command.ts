import { spawn } from "node:child_process"
import { BaseError } from "@murmur/errors"

export type RunCommandOptions = {
  command: string
  args: string[]
  cwd?: string
  env?: NodeJS.ProcessEnv

  /** Aborting kills the process with SIGTERM and rejects with `command_aborted`. */
  signal?: AbortSignal

  onStdoutLine?: (line: string) => void
  onStderrLine?: (line: string) => void
}

export type CommandResult = {
  code: number
  /** Last non-empty stdout lines, oldest first. */
  stdout: string[]
  /** Last non-empty stderr lines, oldest first. */
  stderr: string[]
}

export type RunCommandFn = (options: RunCommandOptions) => Promise<CommandResult>

export type CommandErrorCode = "command_failed" | "command_aborted" | "command_spawn_failed"

export class CommandError extends BaseError<CommandErrorCode> {
  static failed(command: string, code: number | null, stderr: string[]): CommandError {
    const detail = stderr.length > 0 ? `: ${stderr.join(" | ")}` : ""

    return new CommandError(`${command} failed with code ${code}${detail}`, {
      code: "command_failed",
      context: { command, exitCode: code, stderr },
    })
  }

  static aborted(command: string): CommandError {
    return new CommandError(`${command} was aborted`, {
      code: "command_aborted",
      context: { command },
    })
  }

  static spawnFailed(command: string, cause: unknown): CommandError {
    return new CommandError(`Could not start ${command}`, {
      code: "command_spawn_failed",
      context: { command },
      cause,
    })
  }
}

const EXCERPT_LINES = 40

export type LineBuffer = {
  push: (chunk: string) => void
  flush: () => void
}

/** Reassembles chunked output into trimmed, non-empty lines. */
export function createLineBuffer(onLine: (line: string) => void): LineBuffer {
  let buffer = ""

  const emit = (line: string) => {
    const trimmed = line.trim()
    if (trimmed) onLine(trimmed)
  }

  return {
    push: (chunk) => {
      buffer += chunk
      const parts = buffer.split(/\r?\n|\r/)
      buffer = parts.pop() ?? ""
      for (const line of parts) emit(line)
    },
    flush: () => {
      emit(buffer)
      buffer = ""
    },
  }
}

function appendExcerpt(target: string[], line: string): void {
  target.push(line)
  if (target.length > EXCERPT_LINES) target.shift()
}

export const runCommand: RunCommandFn = (options) => {
  const { command, args, signal } = options

  if (signal?.aborted) return Promise.reject(CommandError.aborted(command))

  const child = spawn(command, args, {
    cwd: options.cwd,
    env: { ...process.env, ...options.env },
    stdio: ["ignore", "pipe", "pipe"],
  })

  const stdout: string[] = []
  const stderr: string[] = []

  const stdoutLines = createLineBuffer((line) => {
    appendExcerpt(stdout, line)
    options.onStdoutLine?.(line)
  })
  const stderrLines = createLineBuffer((line) => {
    appendExcerpt(stderr, line)
    options.onStderrLine?.(line)
  })

  child.stdout.setEncoding("utf8")
  child.stderr.setEncoding("utf8")
  child.stdout.on("data", (chunk: string) => stdoutLines.push(chunk))
  child.stderr.on("data", (chunk: string) => stderrLines.push(chunk))

  return new Promise<CommandResult>((resolve, reject) => {
    let aborted = false

    const onAbort = () => {
      aborted = true
      child.kill("SIGTERM")
    }
    signal?.addEventListener("abort", onAbort, { once: true })

    child.on("error", (err) => {
      signal?.removeEventListener("abort", onAbort)
      reject(CommandError.spawnFailed(command, err))
    })

    child.on("close", (code) => {
      signal?.removeEventListener("abort", onAbort)
      stdoutLines.flush()
      stderrLines.flush()

      if (aborted) {
        reject(CommandError.aborted(command))
        return
      }

      if (code !== 0) {
        reject(CommandError.failed(command, code, stderr))
        return
      }

      resolve({ code, stdout, stderr })
    })
  })
}
