// ─── Asset Statistics ──────────────────────────────────────────
// Single-asset metrics from a daily close series: latest price,
// last-period change, endpoint return and annualised volatility
// of log returns. Used for equities and crypto alike.
//
// Note the two annualisation conventions: the return is a plain
// first-to-last change over the window, while volatility scales the
// daily log-return deviation by √252. Existing consumers compare
// against figures computed this way, so both stay as they are.

import { Either } from "effect"
import { DataIntegrity, InsufficientData } from "./errors.js"
import { TRADING_DAYS_PER_YEAR, logReturns, sampleStdDev } from "./math.js"
import { applyWindow } from "./window.js"
import type { AssetStatistics, LookbackWindow, PricePoint, PriceSeries } from "./models.js"

export const MIN_OBSERVATIONS = 2

/**
 * Rejects non-positive or non-finite closes and out-of-order
 * timestamps. Shared with the portfolio engine.
 */
export function validatePoints(
  symbol: string,
  points: readonly PricePoint[]
): Either.Either<readonly PricePoint[], DataIntegrity> {
  for (let i = 0; i < points.length; i++) {
    const { close, timestamp } = points[i]
    if (!Number.isFinite(close) || close <= 0) {
      return Either.left(
        new DataIntegrity({
          symbol,
          reason: `close at ${new Date(timestamp).toISOString()} is ${close}; prices must be positive`,
        })
      )
    }
    if (i > 0 && timestamp <= points[i - 1].timestamp) {
      return Either.left(
        new DataIntegrity({ symbol, reason: `timestamps are not strictly increasing at index ${i}` })
      )
    }
  }
  return Either.right(points)
}

export function computeStatistics(
  series: PriceSeries,
  window: LookbackWindow
): Either.Either<AssetStatistics, InsufficientData | DataIntegrity> {
  return Either.gen(function* () {
    const points = applyWindow(series.points, window)
    if (points.length < MIN_OBSERVATIONS) {
      return yield* Either.left(
        new InsufficientData({
          symbol: series.symbol,
          observations: points.length,
          required: MIN_OBSERVATIONS,
        })
      )
    }
    yield* validatePoints(series.symbol, points)

    const closes = points.map((p) => p.close)
    const first = closes[0]
    const previous = closes[closes.length - 2]
    const last = closes[closes.length - 1]

    return {
      symbol: series.symbol,
      currentPrice: last,
      periodChange: ((last - previous) / previous) * 100,
      annualizedReturn: ((last - first) / first) * 100,
      annualizedVolatility:
        sampleStdDev(logReturns(closes)) * Math.sqrt(TRADING_DAYS_PER_YEAR) * 100,
      observations: closes.length,
    }
  })
}
