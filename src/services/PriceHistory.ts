// ─── PriceHistory Service ──────────────────────────────────────
// Effect: Network I/O (HTTP calls to market-data APIs)
//
// Multi-source architecture with automatic failover:
//   Primary:   Stooq daily CSV (equities, ETFs, indices)
//   Fallback:  CryptoCompare histoday JSON (crypto assets)
//
// Either source answers with daily closes for one symbol; the
// result is cut to the requested lookback window. Failures are
// classified as NotFound (unknown symbol) or Unavailable (network,
// rate limit, malformed payload). No retries here: the caller owns
// the retry policy.

import { Context, Data, Effect, Layer, Schema } from "effect"
import type { LookbackWindow, PricePoint, PriceSeries } from "../domain/models.js"
import { applyWindow } from "../domain/window.js"

// ─── Typed Error ───────────────────────────────────────────────

export class PriceHistoryError extends Data.TaggedError("PriceHistoryError")<{
  readonly kind: "NotFound" | "Unavailable"
  readonly symbol: string
  readonly reason: string
  readonly cause?: unknown
}> {}

// ─── Service Definition ────────────────────────────────────────

export class PriceHistory extends Context.Tag("@analytics/PriceHistory")<
  PriceHistory,
  {
    readonly getDailyCloses: (
      symbol: string,
      window: LookbackWindow
    ) => Effect.Effect<PriceSeries, PriceHistoryError>
  }
>() {}

// ─── HTTP Helper ───────────────────────────────────────────────

const HEADERS = {
  Accept: "application/json;q=0.9,text/csv;q=0.8,*/*;q=0.5",
  "User-Agent": "option-risk-analytics/1.0",
}

const httpGetText = (source: string, symbol: string, url: string) =>
  Effect.tryPromise({
    try: () => fetch(url, { headers: HEADERS }),
    catch: (cause) =>
      new PriceHistoryError({
        kind: "Unavailable",
        symbol,
        reason: `[${source}] request failed`,
        cause,
      }),
  }).pipe(
    Effect.filterOrFail(
      (res) => res.ok,
      (res) =>
        new PriceHistoryError({
          kind: res.status === 404 ? "NotFound" : "Unavailable",
          symbol,
          reason: `[${source}] responded with ${res.status}`,
        })
    ),
    Effect.flatMap((res) =>
      Effect.tryPromise({
        try: () => res.text(),
        catch: (cause) =>
          new PriceHistoryError({
            kind: "Unavailable",
            symbol,
            reason: `[${source}] could not read response body`,
            cause,
          }),
      })
    )
  )

const utcDay = (isoDate: string): number => Date.parse(`${isoDate}T00:00:00Z`)

// ─── Stooq Implementation (CSV) ────────────────────────────────

const STOOQ_BASE = "https://stooq.com/q/d/l/"

/** Stooq wants market suffixes for most listings ("aapl.us"). */
const stooqCandidates = (symbol: string): string[] => {
  const base = symbol.toLowerCase()
  return base.includes(".") ? [base] : [`${base}.us`, base]
}

export function parseStooqCsv(csv: string): PricePoint[] {
  const lines = csv.trim().split(/\r?\n/)
  const header = lines.shift()
  if (header === undefined || !header.startsWith("Date")) return []

  const closeIndex = header.split(",").indexOf("Close")
  if (closeIndex < 0) return []

  return lines
    .map((line) => {
      const cells = line.split(",")
      return { timestamp: utcDay(cells[0]), close: parseFloat(cells[closeIndex]) }
    })
    .filter((p) => Number.isFinite(p.timestamp) && Number.isFinite(p.close))
    .sort((a, b) => a.timestamp - b.timestamp)
}

const stooqGetCandidate = (symbol: string, candidate: string) =>
  Effect.gen(function* () {
    const url = `${STOOQ_BASE}?s=${encodeURIComponent(candidate)}&i=d`
    const csv = yield* httpGetText("Stooq", symbol, url)
    const points = parseStooqCsv(csv)
    if (points.length === 0) {
      return yield* Effect.fail(
        new PriceHistoryError({
          kind: "NotFound",
          symbol,
          reason: `[Stooq] no data for ${candidate}`,
        })
      )
    }
    return points
  })

const stooqGetDailyCloses = (symbol: string, window: LookbackWindow) =>
  Effect.firstSuccessOf(
    stooqCandidates(symbol).map((candidate) => stooqGetCandidate(symbol, candidate))
  ).pipe(
    Effect.map((points): PriceSeries => ({ symbol, points: applyWindow(points, window) }))
  )

// ─── CryptoCompare Implementation (Fallback) ───────────────────

const CRYPTOCOMPARE_BASE = "https://min-api.cryptocompare.com/data/v2/histoday"

const HistodayResponse = Schema.Struct({
  Response: Schema.String,
  Message: Schema.optional(Schema.String),
  Data: Schema.optional(
    Schema.Struct({
      Data: Schema.optional(
        Schema.Array(Schema.Struct({ time: Schema.Number, close: Schema.Number }))
      ),
    })
  ),
})

const decodeHistoday = Schema.decodeUnknown(Schema.parseJson(HistodayResponse))

const cryptoCompareGetDailyCloses = (symbol: string, window: LookbackWindow) =>
  Effect.gen(function* () {
    const url = `${CRYPTOCOMPARE_BASE}?fsym=${encodeURIComponent(symbol.toUpperCase())}&tsym=USD&limit=${window.days}`
    const body = yield* httpGetText("CryptoCompare", symbol, url)

    const data = yield* decodeHistoday(body).pipe(
      Effect.mapError(
        (cause) =>
          new PriceHistoryError({
            kind: "Unavailable",
            symbol,
            reason: "[CryptoCompare] invalid response format",
            cause,
          })
      )
    )

    if (data.Response !== "Success") {
      return yield* Effect.fail(
        new PriceHistoryError({
          kind: "NotFound",
          symbol,
          reason: `[CryptoCompare] ${data.Message ?? "request rejected"}`,
        })
      )
    }

    // Days before a coin was listed come back as zero closes.
    const rows = data.Data?.Data ?? []
    const firstListed = rows.findIndex((row) => row.close > 0)
    const points = (firstListed < 0 ? [] : rows.slice(firstListed)).map((row) => ({
      timestamp: row.time * 1000,
      close: row.close,
    }))

    return { symbol, points: applyWindow(points, window) }
  })

// ─── Live Implementation (Stooq → CryptoCompare failover) ──────

export const PriceHistoryLive = Layer.succeed(PriceHistory, {
  getDailyCloses: (symbol, window) =>
    stooqGetDailyCloses(symbol, window).pipe(
      Effect.catchAll((stooqError) =>
        cryptoCompareGetDailyCloses(symbol, window).pipe(
          // An unreachable primary outranks a fallback that never heard of the symbol.
          Effect.mapError((fallbackError) =>
            stooqError.kind === "Unavailable" && fallbackError.kind === "NotFound"
              ? stooqError
              : fallbackError
          )
        )
      )
    ),
})

// ─── Test Implementations (deterministic, no network) ──────────

const MS_PER_DAY = 24 * 60 * 60 * 1000
const SYNTHETIC_END = Date.UTC(2026, 0, 15)
const SYNTHETIC_DAYS = 400

/** A smooth, strictly positive series seeded by the symbol's characters. */
export function syntheticSeries(symbol: string, days: number = SYNTHETIC_DAYS): PriceSeries {
  const seed = [...symbol].reduce((sum, ch) => sum + ch.charCodeAt(0), 0)
  const base = 50 + (seed % 200)
  const phase = seed % 7
  const points = Array.from({ length: days }, (_, i) => ({
    timestamp: SYNTHETIC_END - (days - 1 - i) * MS_PER_DAY,
    close: base + Math.sin(i * 0.5 + phase) * base * 0.05 + i * base * 0.0005,
  }))
  return { symbol, points }
}

export const PriceHistoryTest = Layer.succeed(PriceHistory, {
  getDailyCloses: (symbol, window) => {
    const series = syntheticSeries(symbol)
    return Effect.succeed({ symbol, points: applyWindow(series.points, window) })
  },
})

/** Serves exactly the given series; any other symbol is NotFound. */
export const makePriceHistoryTest = (fixtures: Readonly<Record<string, PriceSeries>>) =>
  Layer.succeed(PriceHistory, {
    getDailyCloses: (symbol, window) => {
      const series = fixtures[symbol]
      return series === undefined
        ? Effect.fail(
            new PriceHistoryError({ kind: "NotFound", symbol, reason: `no fixture for ${symbol}` })
          )
        : Effect.succeed({ symbol, points: applyWindow(series.points, window) })
    },
  })
