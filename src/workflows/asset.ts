// ─── Asset Statistics Workflow ─────────────────────────────────
// Bridges the price-history provider and the pure statistics
// helper. Provider failures are reported as MissingData naming the
// symbol; the statistics themselves come straight from the core.
//
// Data flow:
//   Config (window) → cache lookup → price history (network)
//   → computeStatistics (pure) → cache store

import { Effect, Either, Schedule } from "effect"
import type { InsufficientData, DataIntegrity } from "../domain/errors.js"
import { MissingData } from "../domain/errors.js"
import type { AssetStatistics, LookbackWindow } from "../domain/models.js"
import { computeStatistics } from "../domain/statistics.js"
import { AppConfig, type AppConfiguration } from "../services/AppConfig.js"
import { Logger } from "../services/Logger.js"
import { PriceHistory, type PriceHistoryError } from "../services/PriceHistory.js"
import { ResultCache } from "../services/ResultCache.js"

export type AssetAnalysisError = MissingData | InsufficientData | DataIntegrity

// ─── Shared Fetch Policy ───────────────────────────────────────

/** Exponential backoff, retried only while the source is unavailable. */
export const retryPolicy = (config: AppConfiguration) =>
  Schedule.exponential(`${config.retryBaseDelayMillis} millis`).pipe(
    Schedule.intersect(Schedule.recurs(config.maxRetries))
  )

export const toMissingData = (error: PriceHistoryError): MissingData =>
  new MissingData({
    symbols: [error.symbol],
    reason: `${error.kind === "NotFound" ? "unknown symbol" : "source unavailable"} (${error.reason})`,
    retriable: error.kind === "Unavailable",
  })

/** Provider symbols are upper-case with no surrounding blanks. */
export const normalizeSymbol = (symbol: string): string => symbol.trim().toUpperCase()

/** Daily closes with the configured retry policy. */
export const fetchSeries = (symbol: string, window: LookbackWindow) =>
  Effect.gen(function* () {
    const priceHistory = yield* PriceHistory
    const config = yield* AppConfig
    const logger = yield* Logger

    return yield* priceHistory.getDailyCloses(symbol, window).pipe(
      Effect.retry({
        schedule: retryPolicy(config),
        while: (e) => e.kind === "Unavailable",
      }),
      Effect.tapError((e) =>
        logger.warn("Price history unavailable", {
          symbol,
          kind: e.kind,
          reason: e.reason,
        })
      )
    )
  })

// ─── Single Asset ──────────────────────────────────────────────

export const analyseAsset = (symbol: string, window?: LookbackWindow) =>
  Effect.gen(function* () {
    const config = yield* AppConfig
    const cache = yield* ResultCache
    const logger = yield* Logger
    const period = window ?? config.analysisPeriod
    const normalized = normalizeSymbol(symbol)

    const compute = Effect.gen(function* () {
      yield* logger.debug("Computing asset statistics", {
        symbol: normalized,
        days: period.days,
      })
      const series = yield* fetchSeries(normalized, period).pipe(
        Effect.mapError(toMissingData)
      )
      return yield* computeStatistics(series, period)
    })

    return yield* cache.assetStatistics.getOrCompute(
      ["asset", normalized, period.days],
      compute
    )
  })

// ─── Many Assets ───────────────────────────────────────────────

export interface MarketSnapshot {
  readonly statistics: readonly AssetStatistics[]
  readonly failures: readonly { readonly symbol: string; readonly error: AssetAnalysisError }[]
}

/**
 * Statistics for several symbols at once. A symbol that fails is
 * reported next to the others instead of failing the whole batch.
 */
export const analyseMarket = (symbols: readonly string[], window?: LookbackWindow) =>
  Effect.gen(function* () {
    const config = yield* AppConfig
    const logger = yield* Logger

    const outcomes = yield* Effect.forEach(
      symbols,
      (symbol) => Effect.either(analyseAsset(symbol, window)),
      { concurrency: config.priceFetchConcurrency }
    )

    const statistics: AssetStatistics[] = []
    const failures: { symbol: string; error: AssetAnalysisError }[] = []
    outcomes.forEach((outcome, i) => {
      if (Either.isRight(outcome)) statistics.push(outcome.right)
      else failures.push({ symbol: symbols[i], error: outcome.left })
    })

    yield* logger.info("Market statistics computed", {
      requested: symbols.length,
      succeeded: statistics.length,
      failed: failures.length,
    })

    const snapshot: MarketSnapshot = { statistics, failures }
    return snapshot
  })
