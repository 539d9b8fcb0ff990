import { BaseError } from "@murmur/errors"

export type ShellSplitErrorCode = "unclosed_quote" | "dangling_escape"

export class ShellSplitError extends BaseError<ShellSplitErrorCode> {
  static unclosedQuote(quote: string): ShellSplitError {
    return new ShellSplitError(`No closing quotation for ${quote}`, {
      code: "unclosed_quote",
      context: { quote },
    })
  }

  static danglingEscape(): ShellSplitError {
    return new ShellSplitError("No escaped character after trailing backslash", {
      code: "dangling_escape",
    })
  }
}

const DOUBLE_QUOTE_ESCAPABLE = new Set(["\\", '"', "$", "`", "\n"])

/**
 * Splits a command line into words using POSIX shell quoting rules.
 *
 * Single quotes keep everything literally. Inside double quotes a backslash
 * only escapes `\`, `"`, `$`, backtick and newline. Outside quotes it escapes
 * any character.
 */
export function shellSplit(input: string): string[] {
  const words: string[] = []
  let current = ""
  let inWord = false
  let i = 0

  while (i < input.length) {
    const ch = input.charAt(i)

    if (/\s/.test(ch)) {
      if (inWord) {
        words.push(current)
        current = ""
        inWord = false
      }
      i++
      continue
    }

    inWord = true

    if (ch === "'") {
      const end = input.indexOf("'", i + 1)
      if (end === -1) throw ShellSplitError.unclosedQuote("'")
      current += input.slice(i + 1, end)
      i = end + 1
      continue
    }

    if (ch === '"') {
      i++
      let closed = false
      while (i < input.length) {
        const inner = input.charAt(i)
        if (inner === '"') {
          closed = true
          i++
          break
        }
        const next = input.charAt(i + 1)
        if (inner === "\\" && DOUBLE_QUOTE_ESCAPABLE.has(next)) {
          current += next
          i += 2
          continue
        }
        current += inner
        i++
      }
      if (!closed) throw ShellSplitError.unclosedQuote('"')
      continue
    }

    if (ch === "\\") {
      if (i + 1 >= input.length) throw ShellSplitError.danglingEscape()
      current += input.charAt(i + 1)
      i += 2
      continue
    }

    current += ch
    i++
  }

  if (inWord) words.push(current)

  return words
}
