import { MemoryLogger } from "../memory-logger"

describe("MemoryLogger behavior", () => {
  it("shares one entry list between a logger and its children", () => {
    const root = new MemoryLogger()
    const child = root.child({ channel: "orders" })

    root.info("opened")
    child.debug("sent value", { bytes: 3 })

    expect(root.entries()).toEqual([
      { level: "info", message: "opened", fields: {} },
      { level: "debug", message: "sent value", fields: { channel: "orders", bytes: 3 } },
    ])
  })

  it("returns a copy of its entries", () => {
    const logger = new MemoryLogger()
    logger.info("once")

    logger.entries().pop()

    expect(logger.entries()).toHaveLength(1)
  })

  it("clear() empties the shared list", () => {
    const root = new MemoryLogger()
    const child = root.child({ codec: "u8" })

    child.warn("receive failed")
    root.clear()

    expect(child).toBeInstanceOf(MemoryLogger)
    expect(root.entries()).toEqual([])
  })
})
