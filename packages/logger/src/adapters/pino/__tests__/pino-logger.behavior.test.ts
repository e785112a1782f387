import { Writable } from "node:stream"
import { describe, expect, it } from "vitest"

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

  const parsed = (i: number): Record<string, unknown> => JSON.parse(lines[i] ?? "{}")

  return { lines, parsed, destination }
}

describe("PinoLogger behavior", () => {
  it("emits JSON to the provided destination", () => {
    const { lines, parsed, destination } = makeLineDestination()

    const logger = new PinoLogger(
      { destination },
      { level: "trace", prettify: false },
      { service: "tensorwire" },
    )

    logger.info("hello", { feature: "age" })

    expect(lines).toHaveLength(1)

    const payload = parsed(0)

    expect(payload).toMatchObject({
      msg: "hello",
      service: "tensorwire",
      feature: "age",
      level: 30,
    })
    expect(typeof payload.time).toBe("number")
  })

  it("child() inherits the base logger sink and level", () => {
    const { lines, parsed, destination } = makeLineDestination()

    const base = new PinoLogger({ destination }, { level: "warn" }, { requestId: "r-1" })
    const child = base.child({ feature: "age" })

    child.info("ignored")
    child.warn("logged")

    expect(lines).toHaveLength(1)
    expect(parsed(0)).toMatchObject({ msg: "logged", requestId: "r-1", feature: "age" })
  })

  it("serializes err with its cause", () => {
    const { parsed, destination } = makeLineDestination()

    const logger = createPinoLogger({ destination }, { level: "info" })
    const err = new Error("outer", { cause: new Error("inner") })

    logger.error("failed", { err })

    expect(parsed(0).err).toMatchObject({
      type: "Error",
      message: "outer",
      cause: { type: "Error", message: "inner" },
    })
  })

  it("prettify is ignored when a destination stream is given", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger({ destination }, { level: "info", prettify: true })

    logger.info("plain")

    expect(JSON.parse(lines[0] ?? "{}")).toMatchObject({ msg: "plain" })
  })
})
