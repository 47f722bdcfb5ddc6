import { createNullLogger, NullLogger } from "../null-logger"

describe("NullLogger", () => {
  it("accepts every level without throwing", () => {
    const logger = createNullLogger()

    expect(() => {
      logger.trace("x")
      logger.debug("x")
      logger.info("x", { source: "args" })
      logger.warn("x", { err: new Error("y") })
      logger.error("x")
      logger.fatal("x")
    }).not.toThrow()
  })

  it("child() returns another null logger", () => {
    const child = new NullLogger().child({ source: "file" })

    expect(child).toBeInstanceOf(NullLogger)
  })
})
