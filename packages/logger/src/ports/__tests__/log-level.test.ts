import { isLogLevelName, levelName, levelValue, LogLevels } from "../log-level"

describe("log levels", () => {
  it("maps names to pino's numbers and back", () => {
    expect(levelValue("warn")).toBe(LogLevels.Warn)
    expect(levelName(50)).toBe("error")
    expect(levelName(35)).toBeUndefined()
  })

  it("recognizes level names", () => {
    expect(isLogLevelName("debug")).toBe(true)
    expect(isLogLevelName("verbose")).toBe(false)
    expect(isLogLevelName(20)).toBe(false)
  })
})
