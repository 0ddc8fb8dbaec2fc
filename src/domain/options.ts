// ─── Black-Scholes Option Pricer ───────────────────────────────
// Closed-form European option valuation and a spot × volatility
// price surface. Pure functions: every failure is returned as an
// InvalidParameter on the left of an Either, never thrown.
//
//   d1   = (ln(S/K) + (r + σ²/2)·T) / (σ·√T)
//   d2   = d1 − σ·√T
//   call = S·Φ(d1) − K·e^(−rT)·Φ(d2)
//   put  = K·e^(−rT)·Φ(−d2) − S·Φ(−d1)

import { Either } from "effect"
import { InvalidParameter } from "./errors.js"
import { linspace, normalCdf } from "./math.js"
import type {
  MarketParameters,
  OptionParameters,
  OptionQuote,
  OptionSurface,
  SurfaceBounds,
} from "./models.js"

// Below this σ·√T the option has no time value left to price.
const DEGENERATE_VOL_TIME = 1e-12

export const DEFAULT_GRID_SIZE = 10

// ─── Validation ────────────────────────────────────────────────

const invalid = (parameter: string, reason: string) =>
  Either.left(new InvalidParameter({ parameter, reason }))

/** Strike, maturity and rate: the contract terms a surface holds fixed. */
function validateTerms(
  params: MarketParameters
): Either.Either<MarketParameters, InvalidParameter> {
  const { strike, maturity, rate } = params
  if (!Number.isFinite(strike) || strike <= 0) return invalid("strike", `must be > 0 (got ${strike})`)
  if (!Number.isFinite(maturity) || maturity <= 0) return invalid("maturity", `must be > 0 (got ${maturity})`)
  if (!Number.isFinite(rate) || rate < 0) return invalid("rate", `must be >= 0 (got ${rate})`)
  return Either.right(params)
}

function validateMarket(
  params: MarketParameters
): Either.Either<MarketParameters, InvalidParameter> {
  const { spot, volatility } = params
  if (!Number.isFinite(spot) || spot <= 0) return invalid("spot", `must be > 0 (got ${spot})`)
  return Either.flatMap(validateTerms(params), (p) =>
    !Number.isFinite(volatility) || volatility < 0
      ? invalid("volatility", `must be >= 0 (got ${volatility})`)
      : Either.right(p)
  )
}

// ─── Pricing ───────────────────────────────────────────────────

function quote(params: MarketParameters): OptionQuote {
  const { spot, strike, maturity, rate, volatility } = params
  const discountedStrike = strike * Math.exp(-rate * maturity)
  const volTime = volatility * Math.sqrt(maturity)

  if (volTime <= DEGENERATE_VOL_TIME) {
    return {
      call: Math.max(spot - discountedStrike, 0),
      put: Math.max(discountedStrike - spot, 0),
    }
  }

  const d1 =
    (Math.log(spot / strike) + (rate + (volatility * volatility) / 2) * maturity) /
    volTime
  const d2 = d1 - volTime

  // Clamp away the last ulp of approximation error below zero.
  return {
    call: Math.max(spot * normalCdf(d1) - discountedStrike * normalCdf(d2), 0),
    put: Math.max(discountedStrike * normalCdf(-d2) - spot * normalCdf(-d1), 0),
  }
}

export function price(
  params: OptionParameters
): Either.Either<number, InvalidParameter> {
  // `type` may arrive from untyped callers (CLI, HTTP).
  const type: string = params.type
  if (type !== "call" && type !== "put") {
    return invalid("type", `must be "call" or "put" (got "${type}")`)
  }
  return Either.map(validateMarket(params), (p) => quote(p)[params.type])
}

/** Call and put for one parameter set. */
export function priceBoth(
  params: MarketParameters
): Either.Either<OptionQuote, InvalidParameter> {
  return Either.map(validateMarket(params), quote)
}

/** Discounted intrinsic value, the σ → 0 limit of the price. */
export function intrinsicValue(params: OptionParameters): number {
  const discountedStrike = params.strike * Math.exp(-params.rate * params.maturity)
  return params.type === "call"
    ? Math.max(params.spot - discountedStrike, 0)
    : Math.max(discountedStrike - params.spot, 0)
}

// ─── Sensitivity Surface ───────────────────────────────────────

function validateBounds(
  bounds: SurfaceBounds,
  gridSize: number
): Either.Either<SurfaceBounds, InvalidParameter> {
  const { minSpot, maxSpot, minVolatility, maxVolatility } = bounds
  const named: ReadonlyArray<readonly [string, number]> = [
    ["minSpot", minSpot],
    ["maxSpot", maxSpot],
    ["minVolatility", minVolatility],
    ["maxVolatility", maxVolatility],
  ]
  for (const [name, value] of named) {
    if (!Number.isFinite(value) || value < 0) {
      return invalid(name, `must be a non-negative number (got ${value})`)
    }
  }
  if (minSpot >= maxSpot) {
    return invalid("minSpot", `must be below maxSpot (${minSpot} >= ${maxSpot})`)
  }
  if (minVolatility >= maxVolatility) {
    return invalid(
      "minVolatility",
      `must be below maxVolatility (${minVolatility} >= ${maxVolatility})`
    )
  }
  if (!Number.isInteger(gridSize) || gridSize < 2) {
    return invalid("gridSize", `must be an integer >= 2 (got ${gridSize})`)
  }
  return Either.right(bounds)
}

// A worthless underlying: the call is worth nothing and the put is
// the discounted strike, whatever the volatility.
const zeroSpotQuote = (terms: MarketParameters): OptionQuote => ({
  call: 0,
  put: terms.strike * Math.exp(-terms.rate * terms.maturity),
})

/**
 * Prices calls and puts at every (spot, volatility) node of a regular
 * `gridSize` × `gridSize` lattice. Strike, maturity and rate come from
 * `base`; its own spot and volatility are ignored. Rows follow spot
 * ascending, columns volatility ascending. A lower spot bound of 0 is
 * priced as the S → 0 limit.
 */
export function generateSurface(
  base: MarketParameters,
  bounds: SurfaceBounds,
  gridSize: number = DEFAULT_GRID_SIZE
): Either.Either<OptionSurface, InvalidParameter> {
  return Either.gen(function* () {
    yield* validateBounds(bounds, gridSize)
    const terms = yield* validateTerms(base)

    const spots = linspace(bounds.minSpot, bounds.maxSpot, gridSize)
    const volatilities = linspace(bounds.minVolatility, bounds.maxVolatility, gridSize)
    const call: number[][] = []
    const put: number[][] = []

    for (const spot of spots) {
      const callRow: number[] = []
      const putRow: number[] = []
      for (const volatility of volatilities) {
        const q =
          spot === 0 ? zeroSpotQuote(terms) : yield* priceBoth({ ...terms, spot, volatility })
        callRow.push(q.call)
        putRow.push(q.put)
      }
      call.push(callRow)
      put.push(putRow)
    }

    return { spots, volatilities, call, put }
  })
}
