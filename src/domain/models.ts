// ─── Pure Domain Models ────────────────────────────────────────
// These types describe the analytics domain with zero side effects.
//
// Schemas validate data crossing an I/O boundary (portfolio files,
// HTTP bodies). Once decoded, the plain interfaces below flow
// through the pure core.

import { Schema } from "effect"

// ─── Branded Primitives ────────────────────────────────────────

export const TickerSymbol = Schema.String.pipe(
  Schema.pattern(/^[A-Za-z0-9.^=-]{1,20}$/, {
    message: () => "Symbol must be 1-20 letters, digits or . ^ = -",
  }),
  Schema.brand("TickerSymbol")
)
export type TickerSymbol = typeof TickerSymbol.Type

const PositiveNumber = Schema.Number.pipe(
  Schema.filter((n) => Number.isFinite(n) && n > 0, {
    message: () => "Expected a positive number",
  })
)

// ─── Schema-Validated Boundary Models ──────────────────────────

export const HoldingSchema = Schema.Struct({
  symbol: TickerSymbol,
  shares: PositiveNumber,
  price: PositiveNumber,
})

export const PortfolioFileSchema = Schema.Struct({
  name: Schema.String,
  holdings: Schema.Array(HoldingSchema),
})
export type PortfolioFile = typeof PortfolioFileSchema.Type

export const decodePortfolioFile = Schema.decodeUnknownEither(PortfolioFileSchema)

// ─── Options ───────────────────────────────────────────────────

export type OptionType = "call" | "put"

export interface OptionParameters {
  /** Underlying spot price. */
  readonly spot: number
  readonly strike: number
  /** Time to maturity in years. */
  readonly maturity: number
  /** Continuously compounded annual risk-free rate, as a fraction. */
  readonly rate: number
  /** Annualised volatility, as a fraction. */
  readonly volatility: number
  readonly type: OptionType
}

export type MarketParameters = Omit<OptionParameters, "type">

export interface OptionQuote {
  readonly call: number
  readonly put: number
}

export interface SurfaceBounds {
  readonly minSpot: number
  readonly maxSpot: number
  readonly minVolatility: number
  readonly maxVolatility: number
}

/**
 * Call and put prices over a spot × volatility lattice.
 * `call[i][j]` is priced at `spots[i]` and `volatilities[j]`.
 */
export interface OptionSurface {
  readonly spots: readonly number[]
  readonly volatilities: readonly number[]
  readonly call: readonly (readonly number[])[]
  readonly put: readonly (readonly number[])[]
}

// ─── Price History ─────────────────────────────────────────────

export interface PricePoint {
  /** Epoch milliseconds, UTC. */
  readonly timestamp: number
  readonly close: number
}

export interface PriceSeries {
  readonly symbol: string
  readonly points: readonly PricePoint[]
}

export interface LookbackWindow {
  readonly label: string
  readonly days: number
}

// ─── Asset Statistics ──────────────────────────────────────────

export interface AssetStatistics {
  readonly symbol: string
  readonly currentPrice: number
  /** Last close against the one before it, in percent. */
  readonly periodChange: number
  /** First-to-last close over the window, in percent. */
  readonly annualizedReturn: number
  readonly annualizedVolatility: number
  readonly observations: number
}

// ─── Portfolio ─────────────────────────────────────────────────

export interface Holding {
  readonly symbol: string
  readonly shares: number
  readonly currentPrice: number
}

export interface SymbolMatrix {
  readonly symbols: readonly string[]
  readonly values: readonly (readonly number[])[]
}

export type CovarianceMatrix = SymbolMatrix
export type CorrelationMatrix = SymbolMatrix

export interface HoldingMetrics {
  readonly symbol: string
  readonly shares: number
  readonly currentPrice: number
  readonly value: number
  readonly weight: number
  readonly annualizedReturn: number
  readonly annualizedVolatility: number
}

export interface PortfolioMetrics {
  readonly totalValue: number
  readonly expectedReturn: number
  readonly volatility: number
  readonly sharpeRatio: number
  readonly holdings: readonly HoldingMetrics[]
  /** Annualised, fractional. */
  readonly covariance: CovarianceMatrix
  readonly correlation: CorrelationMatrix
  /** Aligned return observations behind every statistic. */
  readonly observations: number
}

export interface PortfolioReport {
  readonly metrics: PortfolioMetrics
  readonly period: LookbackWindow
  readonly generatedAt: string
}
