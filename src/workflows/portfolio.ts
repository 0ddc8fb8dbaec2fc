// ─── Portfolio Analysis Workflow ───────────────────────────────
// This module composes effectful services with the pure portfolio
// engine. It is the bridge between the effectful world (price
// history, cache, clock) and the pure world (domain/portfolio.ts).
//
// Data flow:
//   Config (window, risk-free rate) → cache lookup
//   → historical closes (network, concurrent, retried)
//   → computeMetrics (pure) → report stamp (clock) → cache store
//
// Every symbol whose history cannot be fetched is collected, and the
// request fails once with a MissingData naming all of them.

import { Effect, Either } from "effect"
import { MissingData } from "../domain/errors.js"
import type { Holding, LookbackWindow, PortfolioReport, PriceSeries } from "../domain/models.js"
import { computeMetrics } from "../domain/portfolio.js"
import { windowOfDays } from "../domain/window.js"
import { AppConfig } from "../services/AppConfig.js"
import { Clock } from "../services/Clock.js"
import { Logger } from "../services/Logger.js"
import { ResultCache } from "../services/ResultCache.js"
import { fetchSeries, normalizeSymbol } from "./asset.js"

// Extra history fetched per symbol so the engine can end every window
// at the same date even when one market closed a few days earlier.
const ALIGNMENT_SLACK_DAYS = 7

export interface PortfolioRequest {
  readonly holdings: readonly Holding[]
  readonly window?: LookbackWindow
  /** Annual, fractional. Defaults to the configured rate. */
  readonly riskFreeRate?: number
}

// ─── Historical Data ───────────────────────────────────────────

const fetchAllSeries = (symbols: readonly string[], window: LookbackWindow) =>
  Effect.gen(function* () {
    const config = yield* AppConfig
    const logger = yield* Logger

    yield* logger.debug("Fetching historical closes", {
      symbols,
      days: window.days,
      concurrency: config.priceFetchConcurrency,
    })

    const fetchWindow = windowOfDays(window.days + ALIGNMENT_SLACK_DAYS)
    const outcomes = yield* Effect.all(
      symbols.map((symbol) => fetchSeries(symbol, fetchWindow)),
      { concurrency: config.priceFetchConcurrency, mode: "either" }
    )

    const found = new Map<string, PriceSeries>()
    const missing: string[] = []
    const reasons: string[] = []
    let retriable = false
    outcomes.forEach((outcome, i) => {
      if (Either.isRight(outcome)) {
        found.set(symbols[i], outcome.right)
      } else {
        missing.push(symbols[i])
        retriable ||= outcome.left.kind === "Unavailable"
        reasons.push(`${symbols[i]}: ${outcome.left.reason}`)
      }
    })

    if (missing.length > 0) {
      return yield* Effect.fail(
        new MissingData({ symbols: missing, reason: reasons.join("; "), retriable })
      )
    }
    return found
  })

// ─── Core Analysis Pipeline ────────────────────────────────────

export const analysePortfolio = (request: PortfolioRequest) =>
  Effect.gen(function* () {
    const config = yield* AppConfig
    const cache = yield* ResultCache
    const clock = yield* Clock
    const logger = yield* Logger

    const window = request.window ?? config.analysisPeriod
    const riskFreeRate = request.riskFreeRate ?? config.riskFreeRate
    const holdings = request.holdings.map((h) => ({ ...h, symbol: normalizeSymbol(h.symbol) }))

    const compute = Effect.gen(function* () {
      yield* logger.info("Starting portfolio analysis", {
        holdings: holdings.length,
        period: window.label,
      })

      const seriesBySymbol = yield* fetchAllSeries(
        holdings.map((h) => h.symbol),
        window
      )
      const metrics = yield* computeMetrics(
        holdings,
        seriesBySymbol,
        riskFreeRate,
        window
      )
      const generatedAt = yield* clock.nowIso()

      yield* logger.info("Portfolio analysis complete", {
        value: metrics.totalValue.toFixed(2),
        expectedReturn: metrics.expectedReturn.toFixed(2),
        volatility: metrics.volatility.toFixed(2),
        sharpe: metrics.sharpeRatio.toFixed(3),
      })

      const report: PortfolioReport = { metrics, period: window, generatedAt }
      return report
    })

    return yield* cache.portfolioReports.getOrCompute(
      [
        "portfolio",
        holdings.map((h) => [h.symbol, h.shares, h.currentPrice]),
        window.days,
        riskFreeRate,
      ],
      compute.pipe(
        Effect.tapError((error) =>
          logger.warn("Portfolio analysis failed", { error: error._tag, message: error.message })
        )
      )
    )
  })
