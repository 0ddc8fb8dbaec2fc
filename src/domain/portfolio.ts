// ─── Portfolio Risk Engine ─────────────────────────────────────
// Every function in this module is pure: deterministic, no I/O,
// no service dependencies. Given holdings and their price history
// it produces weights, per-asset annualised statistics and the
// aggregate expected return, volatility and Sharpe ratio through
// the covariance matrix of aligned daily returns.
//
// Internals stay fractional; percentages (×100) are applied once,
// when the result object is assembled.

import { Either } from "effect"
import {
  DataIntegrity,
  DivisionByZero,
  InvalidParameter,
  MissingData,
} from "./errors.js"
import {
  TRADING_DAYS_PER_YEAR,
  mean,
  sampleCovariance,
  sampleStdDev,
  simpleReturns,
} from "./math.js"
import { MIN_OBSERVATIONS, validatePoints } from "./statistics.js"
import { applyWindow } from "./window.js"
import type {
  CorrelationMatrix,
  CovarianceMatrix,
  Holding,
  HoldingMetrics,
  LookbackWindow,
  PortfolioMetrics,
  PricePoint,
  PriceSeries,
} from "./models.js"

// Below this the portfolio has no measurable risk to divide by.
const ZERO_VOLATILITY = 1e-12

export type PortfolioError =
  | InvalidParameter
  | MissingData
  | DataIntegrity
  | DivisionByZero

/** Daily simple returns per symbol over timestamps every symbol shares. */
export interface AlignedReturns {
  readonly symbols: readonly string[]
  readonly timestamps: readonly number[]
  /** `returns[k]` is the series for `symbols[k]`. */
  readonly returns: readonly (readonly number[])[]
}

// ─── Validation ────────────────────────────────────────────────

function validateHoldings(
  holdings: readonly Holding[],
  riskFreeRate: number
): Either.Either<readonly Holding[], InvalidParameter> {
  if (holdings.length === 0) {
    return Either.left(
      new InvalidParameter({ parameter: "holdings", reason: "portfolio cannot be empty" })
    )
  }
  if (!Number.isFinite(riskFreeRate)) {
    return Either.left(
      new InvalidParameter({ parameter: "riskFreeRate", reason: `must be finite (got ${riskFreeRate})` })
    )
  }

  const seen = new Set<string>()
  for (const h of holdings) {
    if (seen.has(h.symbol)) {
      return Either.left(
        new InvalidParameter({ parameter: "holdings", reason: `duplicate symbol ${h.symbol}` })
      )
    }
    seen.add(h.symbol)
    if (!Number.isFinite(h.shares) || h.shares <= 0) {
      return Either.left(
        new InvalidParameter({ parameter: `${h.symbol}.shares`, reason: `must be > 0 (got ${h.shares})` })
      )
    }
    if (!Number.isFinite(h.currentPrice) || h.currentPrice <= 0) {
      return Either.left(
        new InvalidParameter({
          parameter: `${h.symbol}.currentPrice`,
          reason: `must be > 0 (got ${h.currentPrice})`,
        })
      )
    }
  }
  return Either.right(holdings)
}

const commonEnd = (
  holdings: readonly Holding[],
  seriesBySymbol: ReadonlyMap<string, PriceSeries>
): number | undefined => {
  let end: number | undefined
  for (const { symbol } of holdings) {
    const points = seriesBySymbol.get(symbol)?.points ?? []
    const last = points[points.length - 1]
    if (last !== undefined && (end === undefined || last.timestamp < end)) end = last.timestamp
  }
  return end
}

/**
 * Windows every holding's series and checks that each one is present
 * with enough observations. All offending symbols are reported at once.
 *
 * Every window ends at the same instant: the latest timestamp that all
 * series have reached, so a series that stops early (a Friday close
 * next to a weekend crypto close) does not shift the others.
 */
function collectWindowedSeries(
  holdings: readonly Holding[],
  seriesBySymbol: ReadonlyMap<string, PriceSeries>,
  window: LookbackWindow
): Either.Either<readonly (readonly PricePoint[])[], MissingData | DataIntegrity> {
  return Either.gen(function* () {
    const absent: string[] = []
    const short: string[] = []
    const windowed: (readonly PricePoint[])[] = []
    const end = commonEnd(holdings, seriesBySymbol)

    for (const { symbol } of holdings) {
      const series = seriesBySymbol.get(symbol)
      if (series === undefined) {
        absent.push(symbol)
        continue
      }
      const points = applyWindow(series.points, window, end)
      if (points.length < MIN_OBSERVATIONS) short.push(symbol)
      windowed.push(yield* validatePoints(symbol, points))
    }

    if (absent.length > 0) {
      return yield* Either.left(
        new MissingData({ symbols: absent, reason: "no price history available", retriable: false })
      )
    }
    if (short.length > 0) {
      return yield* Either.left(
        new MissingData({
          symbols: short,
          reason: `fewer than ${MIN_OBSERVATIONS} observations in the last ${window.days} days`,
          retriable: false,
        })
      )
    }
    return windowed
  })
}

// ─── Return Alignment ──────────────────────────────────────────

/**
 * Inner-joins the close series on timestamp (a date missing from any
 * symbol is dropped for all) and turns the aligned closes into daily
 * simple returns. Every symbol ends up with the same sample size.
 */
export function alignReturns(
  symbols: readonly string[],
  series: readonly (readonly PricePoint[])[]
): AlignedReturns {
  const closeMaps = series.map(
    (points) => new Map(points.map((p) => [p.timestamp, p.close]))
  )
  const shared = (series[0] ?? [])
    .map((p) => p.timestamp)
    .filter((t) => closeMaps.every((m) => m.has(t)))

  const returns = closeMaps.map((m) =>
    simpleReturns(shared.map((t) => m.get(t) ?? Number.NaN))
  )

  return { symbols, timestamps: shared.slice(1), returns }
}

// ─── Covariance & Correlation ──────────────────────────────────

/** Annualised sample covariance of the aligned returns. */
export function covarianceMatrix(aligned: AlignedReturns): CovarianceMatrix {
  const values = aligned.returns.map((ri) =>
    aligned.returns.map((rj) => sampleCovariance(ri, rj) * TRADING_DAYS_PER_YEAR)
  )
  return { symbols: aligned.symbols, values }
}

/** Zero-variance symbols correlate 0 with everything except themselves. */
export function correlationMatrix(covariance: CovarianceMatrix): CorrelationMatrix {
  const sd = covariance.values.map((row, i) => Math.sqrt(row[i]))
  const values = covariance.values.map((row, i) =>
    row.map((cov, j) => {
      if (i === j) return 1
      const denom = sd[i] * sd[j]
      return denom > 0 ? cov / denom : 0
    })
  )
  return { symbols: covariance.symbols, values }
}

/** wᵗ·Σ·w, clamped at zero against rounding. */
export function portfolioVariance(
  weights: readonly number[],
  covariance: CovarianceMatrix
): number {
  let variance = 0
  for (let i = 0; i < weights.length; i++) {
    for (let j = 0; j < weights.length; j++) {
      variance += weights[i] * covariance.values[i][j] * weights[j]
    }
  }
  return Math.max(variance, 0)
}

// ─── Portfolio Metrics ─────────────────────────────────────────

export function computeMetrics(
  holdings: readonly Holding[],
  seriesBySymbol: ReadonlyMap<string, PriceSeries>,
  riskFreeRate: number,
  window: LookbackWindow
): Either.Either<PortfolioMetrics, PortfolioError> {
  return Either.gen(function* () {
    yield* validateHoldings(holdings, riskFreeRate)
    const windowed = yield* collectWindowedSeries(holdings, seriesBySymbol, window)

    const symbols = holdings.map((h) => h.symbol)
    const values = holdings.map((h) => h.shares * h.currentPrice)
    const totalValue = values.reduce((sum, v) => sum + v, 0)

    const aligned = alignReturns(symbols, windowed)
    // Two shared closes make one return.
    if (aligned.timestamps.length === 0) {
      return yield* Either.left(
        new MissingData({
          symbols,
          reason: `fewer than ${MIN_OBSERVATIONS} observations shared by every symbol`,
          retriable: false,
        })
      )
    }

    const weights = values.map((v) => v / totalValue)
    const annualReturns = aligned.returns.map((r) => mean(r) * TRADING_DAYS_PER_YEAR)
    const annualVols = aligned.returns.map(
      (r) => sampleStdDev(r) * Math.sqrt(TRADING_DAYS_PER_YEAR)
    )

    const expectedReturn = weights.reduce((sum, w, i) => sum + w * annualReturns[i], 0)
    const covariance = covarianceMatrix(aligned)
    const volatility = Math.sqrt(portfolioVariance(weights, covariance))

    if (volatility <= ZERO_VOLATILITY) {
      return yield* Either.left(
        new DivisionByZero({
          quantity: "sharpe ratio",
          reason: "portfolio volatility is zero over the historical window",
        })
      )
    }

    const breakdown: HoldingMetrics[] = holdings.map((h, i) => ({
      symbol: h.symbol,
      shares: h.shares,
      currentPrice: h.currentPrice,
      value: values[i],
      weight: weights[i],
      annualizedReturn: annualReturns[i] * 100,
      annualizedVolatility: annualVols[i] * 100,
    }))

    return {
      totalValue,
      expectedReturn: expectedReturn * 100,
      volatility: volatility * 100,
      sharpeRatio: (expectedReturn - riskFreeRate) / volatility,
      holdings: breakdown,
      covariance,
      correlation: correlationMatrix(covariance),
      observations: aligned.timestamps.length,
    }
  })
}
