import { Writable } from "node:stream"

import { logLevelName } from "../../../ports/log-level"
import { createPinoLogger, PinoLogger } from "../pino-logger"

function makeLineDestination() {
  const lines: string[] = []

  const destination = new Writable({
    write(chunk, _encoding, callback) {
      const line = chunk.toString("utf8").trim()
      if (line) lines.push(line)
      callback()
    },
  })

  return { lines, destination }
}

describe("PinoLogger behavior", () => {
  it("emits JSON to the provided destination", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger(
      { destination },
      { level: "trace", prettify: false },
      { chatId: "c-1" },
    )

    logger.info("hello", { messageId: 42 })

    expect(lines).toHaveLength(1)

    const payload = JSON.parse(lines[0] ?? "")

    expect(payload).toMatchObject({
      msg: "hello",
      chatId: "c-1",
      messageId: 42,
    })
    expect(logLevelName(payload.level)).toBe("info")
    expect(typeof payload.time).toBe("number")
  })

  it("child() inherits the parent sink, level and context", () => {
    const { lines, destination } = makeLineDestination()

    const base = new PinoLogger(
      { destination },
      { level: "warn", prettify: false },
      { chatId: "c-1" },
    )
    const child = base.child({ job: "transcribe c-1:7" })

    child.info("ignored")
    child.warn("logged")

    expect(lines).toHaveLength(1)
    expect(JSON.parse(lines[0] ?? "")).toMatchObject({
      msg: "logged",
      chatId: "c-1",
      job: "transcribe c-1:7",
    })
  })

  it("serializes errors with their cause chain", () => {
    const { lines, destination } = makeLineDestination()
    const logger = createPinoLogger({ destination }, { level: "info" })

    const err = new Error("outer", { cause: new Error("inner") })
    logger.error("failed", { err })

    const payload = JSON.parse(lines[0] ?? "")

    expect(payload.err.type).toBe("Error")
    expect(payload.err.message).toBe("outer")
    expect(payload.err.cause.message).toBe("inner")
  })
})
