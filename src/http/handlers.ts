// ─── HTTP Handlers ─────────────────────────────────────────────
// Request/response logic for the HTTP surface, kept free of express
// so it runs (and is tested) as a plain Effect. Each handler always
// succeeds with a status and a JSON body; errors become
// `{ error: string }` with a 400 for bad input or unusable data
// and a 500 when the upstream source could not be reached.

import { Effect, ParseResult, Schema } from "effect"
import type { AssetStatistics } from "../domain/models.js"
import { TickerSymbol } from "../domain/models.js"
import { windowOfDays } from "../domain/window.js"
import { Logger } from "../services/Logger.js"
import { analyseAsset, type AssetAnalysisError } from "../workflows/asset.js"

export interface HttpResponse<A> {
  readonly status: number
  readonly body: A | { readonly error: string }
}

// ─── Request Schema ────────────────────────────────────────────

export const AssetStatisticsRequest = Schema.Struct({
  symbol: TickerSymbol,
  period_in_days: Schema.Number.pipe(
    Schema.int({ message: () => "period_in_days must be an integer" }),
    Schema.between(1, 3650, { message: () => "period_in_days must be between 1 and 3650" })
  ),
})

const decodeRequest = Schema.decodeUnknown(AssetStatisticsRequest)

// ─── Error Mapping ─────────────────────────────────────────────

export const statusFor = (error: AssetAnalysisError): number => {
  switch (error._tag) {
    case "MissingData":
      // Unknown symbols are the caller's problem; an unreachable source is ours.
      return error.retriable ? 500 : 400
    case "InsufficientData":
    case "DataIntegrity":
      return 400
  }
}

// ─── POST /asset-statistics ────────────────────────────────────

export const handleAssetStatistics = (body: unknown) =>
  Effect.gen(function* () {
    const request = yield* decodeRequest(body)
    const statistics = yield* analyseAsset(request.symbol, windowOfDays(request.period_in_days))
    const response: HttpResponse<AssetStatistics> = { status: 200, body: statistics }
    return response
  }).pipe(
    Effect.catchTag("ParseError", (error) =>
      Effect.succeed<HttpResponse<AssetStatistics>>({
        status: 400,
        body: { error: ParseResult.TreeFormatter.formatErrorSync(error) },
      })
    ),
    Effect.catchAll((error) =>
      Effect.gen(function* () {
        const logger = yield* Logger
        const status = statusFor(error)
        yield* logger.warn("Asset statistics request failed", {
          status,
          error: error._tag,
          message: error.message,
        })
        const response: HttpResponse<AssetStatistics> = { status, body: { error: error.message } }
        return response
      })
    )
  )
