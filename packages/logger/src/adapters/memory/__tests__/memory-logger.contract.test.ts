import { describeLoggerContract } from "../../../ports/__tests__/logger.contract"
import { MemoryLogger } from "../memory-logger"

describeLoggerContract({
  name: "MemoryLogger",
  make: (opts) => {
    const logger = new MemoryLogger(opts)

    return { logger, read: () => logger.entries() }
  },
})
