import { describe, expect, it } from "vitest"
import { ShellSplitError, shellSplit } from "../shell-split"

describe("shellSplit", () => {
  it("splits on runs of whitespace", () => {
    expect(shellSplit("  /tr   model=tiny\tlang=ru  ")).toEqual(["/tr", "model=tiny", "lang=ru"])
  })

  it("keeps quoted spaces inside a word", () => {
    expect(shellSplit(`/tr tz="America/New York" lang='ru, en'`)).toEqual([
      "/tr",
      "tz=America/New York",
      "lang=ru, en",
    ])
  })

  it("honours backslash escapes outside quotes", () => {
    expect(shellSplit("a\\ b c")).toEqual(["a b", "c"])
  })

  it("only unescapes special characters inside double quotes", () => {
    expect(shellSplit(`"a\\"b" "c\\d"`)).toEqual(['a"b', "c\\d"])
  })

  it("keeps empty quoted words", () => {
    expect(shellSplit(`lang="" x`)).toEqual(["lang=", "x"])
  })

  it("returns no words for blank input", () => {
    expect(shellSplit("   ")).toEqual([])
  })

  it("throws on an unclosed quote", () => {
    expect(() => shellSplit(`/tr tz="Europe/Moscow`)).toThrow(ShellSplitError)
  })

  it("throws on a trailing backslash", () => {
    expect(() => shellSplit("/tr \\")).toThrow("No escaped character")
  })
})
