import { BaseError, serializeError } from "../base-error"

class EditFailed extends BaseError<"edit_failed"> {
  constructor(cause?: unknown) {
    super("edit failed", { code: "edit_failed", context: { key: "100:7" }, cause })
  }
}

describe("BaseError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2025-03-01T08:00:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it("applies defaults", () => {
    const err = new BaseError("boom", { code: "boom" })

    expect(err.name).toBe("BaseError")
    expect(err.context).toEqual({})
    expect(err.isRetryable).toBe(false)
    expect(err.isOperational).toBe(true)
    expect(err.timestamp).toEqual(new Date("2025-03-01T08:00:00.000Z"))
  })

  it("names subclasses after themselves and keeps the cause", () => {
    const cause = new Error("FLOOD_WAIT")
    const err = new EditFailed(cause)

    expect(err.name).toBe("EditFailed")
    expect(err.cause).toBe(cause)
    expect(err).toBeInstanceOf(BaseError)
    expect(err.stack).toContain("EditFailed")
  })

  it("freezes a copy of the context", () => {
    const context = { chatId: "100" }
    const err = new BaseError("x", { code: "x", context })

    context.chatId = "200"

    expect(err.context).toEqual({ chatId: "100" })
    expect(Object.isFrozen(err.context)).toBe(true)
  })

  it("toJSON() serializes without the stack", () => {
    const err = new BaseError("rate limited", {
      code: "edit_rate_limited",
      context: { retryAfterSeconds: 30 },
      isRetryable: true,
    })

    expect(err.toJSON()).toEqual({
      name: "BaseError",
      code: "edit_rate_limited",
      message: "rate limited",
      context: { retryAfterSeconds: 30 },
      isOperational: true,
      timestamp: "2025-03-01T08:00:00.000Z",
    })
  })
})

describe("serializeError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2025-03-01T08:00:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it("follows the cause chain into plain errors", () => {
    const err = new EditFailed(new TypeError("bad peer"))

    const serialized = serializeError(err)

    expect(serialized.cause).toEqual({
      name: "TypeError",
      code: "unknown",
      message: "bad peer",
      context: {},
      isOperational: false,
      timestamp: "2025-03-01T08:00:00.000Z",
    })
  })

  it("includes the stack on request", () => {
    const serialized = serializeError(new Error("x"), { includeStack: true })

    expect(serialized.stack).toContain("Error: x")
  })

  it("wraps non-error values", () => {
    expect(serializeError("plain text")).toMatchObject({
      name: "NonErrorThrown",
      message: "plain text",
      context: { value: "plain text" },
    })
    expect(serializeError(42).message).toBe("Unknown error")
  })
})
