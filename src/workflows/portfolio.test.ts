import { Effect, Either, Layer } from "effect"
import { describe, expect, it } from "vitest"
import type { Holding, PriceSeries } from "../domain/models.js"
import { windowOfDays } from "../domain/window.js"
import { AppConfigTest } from "../services/AppConfig.js"
import { ClockTest } from "../services/Clock.js"
import { LoggerSilent } from "../services/Logger.js"
import { PortfolioStore, PortfolioStoreTest } from "../services/PortfolioStore.js"
import {
  PriceHistory,
  PriceHistoryTest,
  makePriceHistoryTest,
} from "../services/PriceHistory.js"
import { ResultCacheLive } from "../services/ResultCache.js"
import { analysePortfolio } from "./portfolio.js"

const DAY = 24 * 60 * 60 * 1000
const SWING = 0.01 * Math.sqrt(0.75)
const RETURNS = [0.001 + SWING, 0.001 - SWING, 0.001 + SWING, 0.001 - SWING]

const compound = (symbol: string, start: number): PriceSeries => {
  const closes = [start]
  for (const r of RETURNS) closes.push(closes[closes.length - 1] * (1 + r))
  return {
    symbol,
    points: closes.map((close, i) => ({ timestamp: Date.UTC(2025, 11, 1) + i * DAY, close })),
  }
}

const A: Holding = { symbol: "A", shares: 10, currentPrice: 100 }
const B: Holding = { symbol: "B", shares: 5, currentPrice: 200 }

const testLayer = (history: Layer.Layer<PriceHistory>) =>
  ResultCacheLive.pipe(
    Layer.provideMerge(
      Layer.mergeAll(AppConfigTest, ClockTest, LoggerSilent, PortfolioStoreTest, history)
    )
  )

const fixtures = makePriceHistoryTest({ A: compound("A", 100), B: compound("B", 200) })

describe("analysePortfolio", () => {
  it("stamps the report with the clock and the configured period", async () => {
    const report = await Effect.runPromise(
      analysePortfolio({ holdings: [A, B] }).pipe(Effect.provide(testLayer(fixtures)))
    )
    expect(report.generatedAt).toBe("2026-01-15T12:00:00.000Z")
    expect(report.period).toEqual({ label: "1y", days: 365 })
    expect(report.metrics.totalValue).toBe(2000)
    expect(report.metrics.expectedReturn).toBeCloseTo(25.2, 6)
    expect(report.metrics.sharpeRatio).toBeCloseTo(1.27248, 5)
  })

  it("uses a caller-supplied rate and window", async () => {
    const report = await Effect.runPromise(
      analysePortfolio({ holdings: [A], riskFreeRate: 0, window: windowOfDays(30) }).pipe(
        Effect.provide(testLayer(fixtures))
      )
    )
    expect(report.period).toEqual({ label: "30d", days: 30 })
    expect(report.metrics.sharpeRatio).toBeCloseTo(0.252 / (0.01 * Math.sqrt(252)), 5)
  })

  it("normalises holding symbols before fetching and caching", async () => {
    const requested: string[] = []
    const recording = Layer.succeed(PriceHistory, {
      getDailyCloses: (symbol: string) =>
        Effect.suspend(() => {
          requested.push(symbol)
          return Effect.succeed(compound(symbol, symbol === "A" ? 100 : 200))
        }),
    })
    const program = Effect.gen(function* () {
      const first = yield* analysePortfolio({ holdings: [{ ...A, symbol: " a " }, B] })
      const second = yield* analysePortfolio({ holdings: [A, { ...B, symbol: "b" }] })
      return { first, second }
    })
    const { first, second } = await Effect.runPromise(program.pipe(Effect.provide(testLayer(recording))))
    expect(first.metrics.holdings.map((h) => h.symbol)).toEqual(["A", "B"])
    expect([...requested].sort()).toEqual(["A", "B"])
    expect(second).toBe(first)
  })

  it("lines up a series that stopped a few days before the others", async () => {
    const closesOn = (symbol: string, closes: readonly number[]): PriceSeries => ({
      symbol,
      points: closes.map((close, i) => ({ timestamp: Date.UTC(2025, 11, 1) + i * DAY, close })),
    })
    const staggered = makePriceHistoryTest({
      A: closesOn("A", [100, 102, 99, 103, 101, 104, 102, 105]),
      B: closesOn("B", [50, 51, 49, 52, 50]),
    })
    const report = await Effect.runPromise(
      analysePortfolio({ holdings: [A, B], window: windowOfDays(3) }).pipe(
        Effect.provide(testLayer(staggered))
      )
    )
    expect(report.metrics.observations).toBe(3)
  })

  it("names every symbol that could not be fetched", async () => {
    const X: Holding = { symbol: "X", shares: 1, currentPrice: 1 }
    const Y: Holding = { symbol: "Y", shares: 1, currentPrice: 1 }
    const result = await Effect.runPromise(
      Effect.either(analysePortfolio({ holdings: [A, X, Y] }).pipe(Effect.provide(testLayer(fixtures))))
    )
    expect(Either.getOrThrow(Either.flip(result))).toMatchObject({
      _tag: "MissingData",
      symbols: ["X", "Y"],
      reason: "X: no fixture for X; Y: no fixture for Y",
      retriable: false,
    })
  })

  it("passes core validation errors through", async () => {
    const result = await Effect.runPromise(
      Effect.either(analysePortfolio({ holdings: [A, A] }).pipe(Effect.provide(testLayer(fixtures))))
    )
    expect(Either.getOrThrow(Either.flip(result))).toMatchObject({
      _tag: "InvalidParameter",
      parameter: "holdings",
    })
  })

  it("analyses a stored portfolio against synthetic prices", async () => {
    const program = Effect.gen(function* () {
      const store = yield* PortfolioStore
      const portfolio = yield* store.loadPortfolio("ignored.json")
      return yield* analysePortfolio({ holdings: portfolio.holdings })
    })
    const report = await Effect.runPromise(program.pipe(Effect.provide(testLayer(PriceHistoryTest))))
    expect(report.metrics.holdings.map((h) => h.symbol)).toEqual(["AAPL", "MSFT"])
    expect(report.metrics.totalValue).toBeCloseTo(10 * 190.5 + 7 * 340.2, 10)
    expect(report.metrics.volatility).toBeGreaterThan(0)
    expect(report.metrics.observations).toBe(365)
  })
})
