import { Either } from "effect"
import { describe, expect, it } from "vitest"
import type { MarketParameters, SurfaceBounds } from "./models.js"
import { generateSurface, intrinsicValue, price, priceBoth } from "./options.js"

const base: MarketParameters = { spot: 100, strike: 110, maturity: 1, rate: 0.05, volatility: 0.2 }
const bounds: SurfaceBounds = { minSpot: 80, maxSpot: 120, minVolatility: 0.1, maxVolatility: 0.5 }

const leftOf = <R, L>(result: Either.Either<R, L>): L => Either.getOrThrow(Either.flip(result))

describe("price", () => {
  it("prices an out-of-the-money call", () => {
    const call = Either.getOrThrow(price({ ...base, type: "call" }))
    expect(call).toBeCloseTo(6.04, 2)
  })

  it("prices the matching put", () => {
    const put = Either.getOrThrow(price({ ...base, type: "put" }))
    expect(put).toBeCloseTo(10.675, 3)
  })

  it("prices an at-the-money pair", () => {
    const quote = Either.getOrThrow(priceBoth({ ...base, strike: 100 }))
    expect(quote.call).toBeCloseTo(10.4506, 4)
    expect(quote.put).toBeCloseTo(5.5735, 4)
  })

  it("satisfies put-call parity", () => {
    const quote = Either.getOrThrow(priceBoth(base))
    const forward = base.spot - base.strike * Math.exp(-base.rate * base.maturity)
    expect(quote.call - quote.put).toBeCloseTo(forward, 8)
  })

  it("falls back to discounted intrinsic value at zero volatility", () => {
    const params = { ...base, strike: 90, volatility: 0 }
    const quote = Either.getOrThrow(priceBoth(params))
    expect(quote.call).toBeCloseTo(100 - 90 * Math.exp(-0.05), 10)
    expect(quote.put).toBe(0)
    expect(intrinsicValue({ ...params, type: "call" })).toBe(quote.call)
    expect(intrinsicValue({ ...params, type: "put" })).toBe(0)
  })

  const nearZeroVolCases: Array<[string, number, number]> = [
    ["in the money", 90, 1e-4],
    ["in the money", 90, 1e-6],
    ["in the money", 90, 1e-9],
    ["at the money", 100, 1e-4],
    ["at the money", 100, 1e-6],
    ["at the money", 100, 1e-9],
    ["out of the money", 120, 1e-4],
    ["out of the money", 120, 1e-6],
    ["out of the money", 120, 1e-9],
  ]

  it.each(nearZeroVolCases)(
    "converges to intrinsic value %s (K=%s, vol=%s)",
    (_label, strike, volatility) => {
      const call = Either.getOrThrow(price({ ...base, strike, volatility, type: "call" }))
      const limit = Math.max(base.spot - strike * Math.exp(-base.rate * base.maturity), 0)
      expect(Number.isNaN(call)).toBe(false)
      expect(call).toBeCloseTo(limit, 6)
    }
  )

  it("never returns a negative price", () => {
    const quote = Either.getOrThrow(priceBoth({ ...base, spot: 1, strike: 500, volatility: 0.01 }))
    expect(quote.call).toBeGreaterThanOrEqual(0)
    expect(quote.put).toBeGreaterThanOrEqual(0)
  })

  const invalidCases: Array<[string, MarketParameters]> = [
    ["spot", { ...base, spot: 0 }],
    ["strike", { ...base, strike: -5 }],
    ["maturity", { ...base, maturity: 0 }],
    ["rate", { ...base, rate: -0.01 }],
    ["volatility", { ...base, volatility: -0.2 }],
    ["spot", { ...base, spot: Number.NaN }],
  ]

  it.each(invalidCases)("rejects an invalid %s", (parameter, params) => {
    const error = leftOf(price({ ...params, type: "call" }))
    expect(error._tag).toBe("InvalidParameter")
    expect(error.parameter).toBe(parameter)
  })

  it("reports the first invalid field", () => {
    const error = leftOf(priceBoth({ ...base, spot: 0, strike: 0 }))
    expect(error.parameter).toBe("spot")
    expect(error.message).toBe("Invalid spot: must be > 0 (got 0)")
  })
})

describe("generateSurface", () => {
  it("lays out a spot × volatility grid with both bounds included", () => {
    const surface = Either.getOrThrow(generateSurface(base, bounds, 5))
    expect(surface.spots).toEqual([80, 90, 100, 110, 120])
    expect(surface.volatilities).toHaveLength(5)
    expect(surface.volatilities[0]).toBe(0.1)
    expect(surface.volatilities[4]).toBe(0.5)
    expect(surface.call).toHaveLength(5)
    expect(surface.call.every((row) => row.length === 5)).toBe(true)
    expect(surface.put).toHaveLength(5)
  })

  it("prices every node like a single quote", () => {
    const surface = Either.getOrThrow(generateSurface(base, bounds, 5))
    const single = Either.getOrThrow(priceBoth({ ...base, spot: 100, volatility: 0.2 }))
    expect(surface.call[2][1]).toBe(single.call)
    expect(surface.put[2][1]).toBe(single.put)
  })

  it("moves prices in the expected directions", () => {
    const surface = Either.getOrThrow(generateSurface(base, bounds, 5))
    for (let j = 0; j < 5; j++) {
      for (let i = 1; i < 5; i++) {
        expect(surface.call[i][j]).toBeGreaterThan(surface.call[i - 1][j])
        expect(surface.put[i][j]).toBeLessThan(surface.put[i - 1][j])
      }
    }
    for (let i = 0; i < 5; i++) {
      for (let j = 1; j < 5; j++) {
        expect(surface.call[i][j]).toBeGreaterThan(surface.call[i][j - 1])
      }
    }
  })

  it("prices a zero lower spot bound as the worthless-underlying limit", () => {
    const surface = Either.getOrThrow(
      generateSurface(base, { minSpot: 0, maxSpot: 150, minVolatility: 0.1, maxVolatility: 0.5 }, 4)
    )
    const discountedStrike = 110 * Math.exp(-0.05)
    expect(surface.spots).toEqual([0, 50, 100, 150])
    expect(surface.call[0]).toEqual([0, 0, 0, 0])
    for (const put of surface.put[0]) expect(put).toBeCloseTo(discountedStrike, 10)
    const next = Either.getOrThrow(priceBoth({ ...base, spot: 50, volatility: 0.1 }))
    expect(surface.put[1][0]).toBe(next.put)
  })

  it("still validates the contract terms when the spot bound is zero", () => {
    const bounds0 = { ...bounds, minSpot: 0 }
    expect(leftOf(generateSurface({ ...base, strike: 0 }, bounds0, 3)).parameter).toBe("strike")
  })

  it("defaults to a 10 × 10 grid", () => {
    const surface = Either.getOrThrow(generateSurface(base, bounds))
    expect(surface.spots).toHaveLength(10)
    expect(surface.volatilities).toHaveLength(10)
  })

  it("rejects inverted bounds", () => {
    expect(leftOf(generateSurface(base, { ...bounds, minSpot: 130 })).parameter).toBe("minSpot")
    expect(
      leftOf(generateSurface(base, { ...bounds, minVolatility: 0.5, maxVolatility: 0.5 })).parameter
    ).toBe("minVolatility")
  })

  it("rejects negative bounds and degenerate grids", () => {
    expect(leftOf(generateSurface(base, { ...bounds, maxVolatility: -1 })).parameter).toBe(
      "maxVolatility"
    )
    expect(leftOf(generateSurface(base, bounds, 1)).parameter).toBe("gridSize")
    expect(leftOf(generateSurface(base, bounds, 2.5)).parameter).toBe("gridSize")
  })

  it("validates the fixed market parameters", () => {
    expect(leftOf(generateSurface({ ...base, maturity: -1 }, bounds, 3)).parameter).toBe("maturity")
  })
})
