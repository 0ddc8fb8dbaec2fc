import { Either } from "effect"
import { describe, expect, it } from "vitest"
import type { PriceSeries } from "./models.js"
import { computeStatistics, validatePoints } from "./statistics.js"
import { windowOfDays } from "./window.js"

const DAY = 24 * 60 * 60 * 1000
const YEAR = windowOfDays(365)

const seriesOf = (symbol: string, closes: readonly number[]): PriceSeries => ({
  symbol,
  points: closes.map((close, i) => ({ timestamp: Date.UTC(2025, 0, 1) + i * DAY, close })),
})

const leftOf = <R, L>(result: Either.Either<R, L>): L => Either.getOrThrow(Either.flip(result))

describe("computeStatistics", () => {
  it("summarises a short series", () => {
    const stats = Either.getOrThrow(computeStatistics(seriesOf("ACME", [100, 110, 99, 121]), YEAR))
    expect(stats.symbol).toBe("ACME")
    expect(stats.currentPrice).toBe(121)
    expect(stats.periodChange).toBeCloseTo(22.2222, 4)
    expect(stats.annualizedReturn).toBeCloseTo(21, 10)
    expect(stats.annualizedVolatility).toBeCloseTo(246.800245, 5)
    expect(stats.observations).toBe(4)
  })

  it("reports zero volatility for a single return", () => {
    const stats = Either.getOrThrow(computeStatistics(seriesOf("ACME", [100, 105]), YEAR))
    expect(stats.periodChange).toBeCloseTo(5, 10)
    expect(stats.annualizedReturn).toBeCloseTo(5, 10)
    expect(stats.annualizedVolatility).toBe(0)
  })

  it("only looks at the lookback window", () => {
    const closes = Array.from({ length: 10 }, (_, i) => 100 + i)
    const stats = Either.getOrThrow(computeStatistics(seriesOf("ACME", closes), windowOfDays(3)))
    expect(stats.observations).toBe(4)
    expect(stats.annualizedReturn).toBeCloseTo(((109 - 106) / 106) * 100, 10)
  })

  it("needs at least two observations", () => {
    const error = leftOf(computeStatistics(seriesOf("ACME", [100]), YEAR))
    expect(error._tag).toBe("InsufficientData")
    expect(error.message).toBe("Not enough data for ACME: 1 observation(s), need 2")
    expect(leftOf(computeStatistics(seriesOf("ACME", []), YEAR))._tag).toBe("InsufficientData")
  })

  it("rejects non-positive closes", () => {
    const error = leftOf(computeStatistics(seriesOf("ACME", [100, 0, 101]), YEAR))
    expect(error._tag).toBe("DataIntegrity")
  })
})

describe("validatePoints", () => {
  it("rejects repeated timestamps", () => {
    const error = leftOf(
      validatePoints("ACME", [
        { timestamp: 1_000, close: 10 },
        { timestamp: 1_000, close: 11 },
      ])
    )
    expect(error.reason).toBe("timestamps are not strictly increasing at index 1")
  })

  it("names the offending close", () => {
    const error = leftOf(validatePoints("ACME", [{ timestamp: 0, close: -1 }]))
    expect(error.message).toBe(
      "Data integrity violation in ACME: close at 1970-01-01T00:00:00.000Z is -1; prices must be positive"
    )
  })

  it("accepts a clean series", () => {
    const points = seriesOf("ACME", [1, 2, 3]).points
    expect(Either.getOrThrow(validatePoints("ACME", points))).toBe(points)
  })
})
