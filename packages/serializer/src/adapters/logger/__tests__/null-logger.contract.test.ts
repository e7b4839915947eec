import { NullLogger } from "../null-logger"

describe("NullLogger contract", () => {
  it("never throws for any method", () => {
    const logger = new NullLogger()

    expect(() => logger.trace("x")).not.toThrow()
    expect(() => logger.debug("x")).not.toThrow()
    expect(() => logger.info("x")).not.toThrow()
    expect(() => logger.warn("x")).not.toThrow()
    expect(() => logger.error("x")).not.toThrow()
    expect(() => logger.fatal("x")).not.toThrow()
  })

  it("child() hands back the same no-op logger", () => {
    const logger = new NullLogger()
    const child = logger.child({ component: "enum-converter-factory" })

    expect(child).toBe(logger)
    expect(() => child.info("x", { enumType: "AccessType" })).not.toThrow()
  })
})
