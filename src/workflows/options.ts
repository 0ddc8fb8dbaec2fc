// ─── Option Pricing Workflow ───────────────────────────────────
// Prices both legs for one parameter set and, when surface bounds
// are given, the spot × volatility grid at the configured density.

import { Effect } from "effect"
import type { MarketParameters, OptionQuote, OptionSurface, SurfaceBounds } from "../domain/models.js"
import { generateSurface, priceBoth } from "../domain/options.js"
import { AppConfig } from "../services/AppConfig.js"
import { Logger } from "../services/Logger.js"

export interface OptionValuation {
  readonly parameters: MarketParameters
  readonly quote: OptionQuote
  readonly surface?: OptionSurface
}

export const priceOption = (params: MarketParameters, bounds?: SurfaceBounds) =>
  Effect.gen(function* () {
    const config = yield* AppConfig
    const logger = yield* Logger

    const quote = yield* priceBoth(params)
    yield* logger.debug("Option priced", { ...params, ...quote })

    if (bounds === undefined) {
      const valuation: OptionValuation = { parameters: params, quote }
      return valuation
    }

    const surface = yield* generateSurface(params, bounds, config.surfaceGridSize)
    yield* logger.debug("Surface generated", { gridSize: config.surfaceGridSize })

    const valuation: OptionValuation = { parameters: params, quote, surface }
    return valuation
  })
