import { NullLogger } from "../null-logger"

describe("NullLogger", () => {
  it("accepts every level without throwing", () => {
    const logger = new NullLogger()

    expect(() => logger.trace("x")).not.toThrow()
    expect(() => logger.debug("x", { memo: "totals" })).not.toThrow()
    expect(() => logger.info("x")).not.toThrow()
    expect(() => logger.warn("x", { err: new Error("x") })).not.toThrow()
    expect(() => logger.error("x")).not.toThrow()
    expect(() => logger.fatal("x")).not.toThrow()
  })

  it("child() returns another NullLogger", () => {
    const child = new NullLogger().child({ runtime: "r-1" })

    expect(child).toBeInstanceOf(NullLogger)
    expect(() => child.info("x")).not.toThrow()
  })
})
