import { describe, expect, it } from "vitest"
import { renderProgress } from "../progress-estimator"
import {
  classifyStatusMessage,
  composeFinalMessage,
  formatFailure,
  formatFailureText,
} from "../status-message"

describe("composeFinalMessage", () => {
  it("prefixes the model and quotes the trimmed body", () => {
    const message = composeFinalMessage("  привет мир  ", "large")

    expect(message.text).toBe("🤖 Транскрипция (model large):\nпривет мир")
    expect(message.quote).toEqual({ offset: 31, length: 10 })
  })

  it("uses a single space for an empty transcript", () => {
    const message = composeFinalMessage("   ", "tiny")

    expect(message.text).toBe("🤖 Транскрипция (model tiny):\n ")
    expect(message.quote).toEqual({ offset: 30, length: 1 })
  })

  it("measures the quote in UTF-16 code units", () => {
    expect(composeFinalMessage("ok 👍", "large").quote.length).toBe(5)
  })
})

describe("formatFailure", () => {
  it("wraps the error name and message in a code block", () => {
    expect(formatFailure(new Error("disk full"))).toBe(
      "🤖 Транскрипция провалена из-за ошибки:\n```\nError: disk full\n```",
    )
  })

  it("limits the error detail to 2000 characters", () => {
    const text = formatFailure(new Error("x".repeat(5000)))
    const detail = text.split("\n")[2] ?? ""

    expect(detail).toHaveLength(2000)
    expect(detail.startsWith("Error: xxx")).toBe(true)
  })

  it("frames a plain explanation the same way", () => {
    expect(formatFailureText("Команда должна быть reply на сообщение с медиа")).toBe(
      "🤖 Транскрипция провалена из-за ошибки:\n```\nКоманда должна быть reply на сообщение с медиа\n```",
    )
  })
})

describe("classifyStatusMessage", () => {
  it("treats any stage in progress as unfinished", () => {
    expect(classifyStatusMessage(renderProgress("download", 40, null, null), "large")).toBe(
      "unfinished",
    )
    expect(
      classifyStatusMessage(renderProgress("transcribe", 100, "2026-01-15 12:30:05 +0300", null), "large"),
    ).toBe("unfinished")
  })

  it("flags a finished transcript made with a worse model", () => {
    expect(classifyStatusMessage("🤖 Транскрипция (model small):\nтекст", "large")).toBe("inferior")
  })

  it("leaves a transcript made with the default or a better model alone", () => {
    expect(classifyStatusMessage("🤖 Транскрипция (model large):\nтекст", "large")).toBeNull()
    expect(classifyStatusMessage("🤖 Транскрипция (model large):\nтекст", "turbo")).toBeNull()
  })

  it("treats the legacy header as the small model", () => {
    expect(classifyStatusMessage("🤖 Транскрипция:\nтекст", "large")).toBe("inferior")
    expect(classifyStatusMessage("🤖 Транскрипция:\nтекст", "small")).toBeNull()
  })

  it("ignores unknown models, failures and plain commands", () => {
    expect(classifyStatusMessage("🤖 Транскрипция (model distil):\nтекст", "large")).toBeNull()
    expect(classifyStatusMessage(formatFailure(new Error("boom")), "large")).toBeNull()
    expect(classifyStatusMessage("/tr model=tiny", "large")).toBeNull()
    expect(classifyStatusMessage("hello 🤖 Транскрипция:", "large")).toBeNull()
  })
})
