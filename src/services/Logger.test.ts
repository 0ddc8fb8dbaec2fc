import { Effect } from "effect"
import { afterEach, describe, expect, it, vi } from "vitest"
import { formatLog, makeConsoleLogger } from "./Logger.js"

describe("formatLog", () => {
  const epoch = new Date(0)

  it("pads the level and appends structured data", () => {
    expect(formatLog("info", "Portfolio loaded", { holdings: 2 }, epoch)).toBe(
      '[1970-01-01T00:00:00.000Z] INFO  Portfolio loaded  {"holdings":2}'
    )
  })

  it("omits the data block when there is none", () => {
    expect(formatLog("error", "Analysis failed", undefined, epoch)).toBe(
      "[1970-01-01T00:00:00.000Z] ERROR Analysis failed"
    )
  })
})

describe("makeConsoleLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it("drops lines below the minimum level", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {})
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {})
    const logger = makeConsoleLogger("warn")

    Effect.runSync(logger.debug("noise"))
    Effect.runSync(logger.info("noise"))
    Effect.runSync(logger.warn("source slow", { symbol: "AAPL" }))

    expect(log).not.toHaveBeenCalled()
    expect(warn).toHaveBeenCalledTimes(1)
    expect(warn.mock.calls[0][0]).toMatch(/ WARN  source slow  \{"symbol":"AAPL"\}$/)
  })

  it("routes errors to stderr", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {})
    Effect.runSync(makeConsoleLogger("debug").error("boom"))
    expect(error).toHaveBeenCalledTimes(1)
  })
})
