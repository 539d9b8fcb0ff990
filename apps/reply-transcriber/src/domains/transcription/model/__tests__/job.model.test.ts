import { describe, expect, it } from "vitest"
import { selectLanguage } from "../job.model"

describe("selectLanguage", () => {
  it("forces the default when nothing is given", () => {
    expect(selectLanguage(undefined, "ru")).toEqual({ force: "ru", allowed: null })
    expect(selectLanguage(" , ", "ru")).toEqual({ force: "ru", allowed: null })
  })

  it("forces a single language", () => {
    expect(selectLanguage("en", "ru")).toEqual({ force: "en", allowed: null })
  })

  it("auto-detects within a list of languages", () => {
    expect(selectLanguage("ru, en", "ru")).toEqual({ force: null, allowed: ["ru", "en"] })
  })
})
