// ─── PortfolioStore Service ─────────────────────────────────────
// Effect: File I/O (reading a portfolio definition)
// Holdings come from a JSON file validated with Effect Schema:
//   { "name": "...", "holdings": [{ "symbol", "shares", "price" }] }

import { Context, Data, Effect, Either, Layer, ParseResult } from "effect"
import * as fs from "node:fs"
import type { Holding } from "../domain/models.js"
import { decodePortfolioFile } from "../domain/models.js"

// ─── Typed Error ───────────────────────────────────────────────

export class StoreError extends Data.TaggedError("StoreError")<{
  readonly reason: string
  readonly cause?: unknown
}> {}

export interface StoredPortfolio {
  readonly name: string
  readonly holdings: readonly Holding[]
}

// ─── Service Definition ────────────────────────────────────────

export class PortfolioStore extends Context.Tag("@analytics/PortfolioStore")<
  PortfolioStore,
  {
    readonly loadPortfolio: (path: string) => Effect.Effect<StoredPortfolio, StoreError>
  }
>() {}

// ─── Decoding ──────────────────────────────────────────────────

export function parsePortfolio(
  content: string,
  source: string
): Either.Either<StoredPortfolio, StoreError> {
  let raw: unknown
  try {
    raw = JSON.parse(content)
  } catch (cause) {
    return Either.left(new StoreError({ reason: `${source} is not valid JSON`, cause }))
  }

  return decodePortfolioFile(raw).pipe(
    Either.mapLeft(
      (cause) =>
        new StoreError({
          reason: `${source} is not a valid portfolio: ${ParseResult.TreeFormatter.formatErrorSync(cause)}`,
          cause,
        })
    ),
    Either.map((file) => ({
      name: file.name,
      holdings: file.holdings.map((h) => ({
        symbol: h.symbol,
        shares: h.shares,
        currentPrice: h.price,
      })),
    }))
  )
}

// ─── Live Implementation (filesystem) ──────────────────────────

export const PortfolioStoreLive = Layer.succeed(PortfolioStore, {
  loadPortfolio: (path) =>
    Effect.try({
      try: () => fs.readFileSync(path, "utf-8"),
      catch: (cause) =>
        new StoreError({ reason: `Failed to read portfolio from ${path}`, cause }),
    }).pipe(Effect.flatMap((content) => parsePortfolio(content, path))),
})

// ─── Test Implementation (in-memory) ───────────────────────────

export const PortfolioStoreTest = Layer.succeed(PortfolioStore, {
  loadPortfolio: () =>
    Effect.succeed({
      name: "Test Portfolio",
      holdings: [
        { symbol: "AAPL", shares: 10, currentPrice: 190.5 },
        { symbol: "MSFT", shares: 7, currentPrice: 340.2 },
      ],
    }),
})
