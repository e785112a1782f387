import { createNullLogger, NullLogger } from "../null-logger"

describe("NullLogger", () => {
  it("accepts every level without output", () => {
    const logger = createNullLogger()
    const write = vi.spyOn(process.stdout, "write")

    logger.trace("x")
    logger.debug("x", { feature: "age" })
    logger.info("x")
    logger.warn("x", { expected: 4, received: 3 })
    logger.error("x", { err: new Error("boom") })
    logger.fatal("x")

    expect(write).not.toHaveBeenCalled()
  })

  it("shares one root instance", () => {
    const logger = createNullLogger()

    expect(logger).toBeInstanceOf(NullLogger)
    expect(createNullLogger()).toBe(logger)
  })

  it("hands out no-op children", () => {
    const child = createNullLogger().child({ requestId: "req-1" })

    expect(child).toBeInstanceOf(NullLogger)
    expect(() => child.warn("x")).not.toThrow()
  })
})
