// ─── AppConfig Service ─────────────────────────────────────────
// Effect: Configuration (reading from environment variables)
// Every tunable of the boundary layer is loaded here through
// Effect's Config module; nothing else reads process.env.

import { Context, Config, ConfigError, Effect, Either, Layer, Option } from "effect"
import type { LookbackWindow } from "../domain/models.js"
import { parseLookback } from "../domain/window.js"

// ─── Config Shape ──────────────────────────────────────────────

export interface AppConfiguration {
  /** Annual, fractional. */
  readonly riskFreeRate: number
  readonly analysisPeriod: LookbackWindow
  readonly surfaceGridSize: number
  readonly priceFetchConcurrency: number
  readonly maxRetries: number
  readonly retryBaseDelayMillis: number
  readonly cacheTtlSeconds: number
  readonly httpPort: number
  readonly portfolioPath: string
}

// ─── Service Definition ────────────────────────────────────────

export class AppConfig extends Context.Tag("@analytics/AppConfig")<
  AppConfig,
  AppConfiguration
>() {}

// ─── Live Implementation (environment variables) ───────────────

const lookback = (name: string, fallback: string) =>
  Config.string(name).pipe(
    Config.withDefault(fallback),
    Config.mapOrFail((raw) =>
      Option.match(parseLookback(raw), {
        onNone: () =>
          Either.left(
            ConfigError.InvalidData([name], `Expected a period such as "6mo", "1y" or a day count, got "${raw}"`)
          ),
        onSome: (window) => Either.right(window),
      })
    )
  )

const loadConfig = Effect.gen(function* () {
  const riskFreeRate = yield* Config.number("RISK_FREE_RATE").pipe(
    Config.withDefault(0.05)
  )
  const analysisPeriod = yield* lookback("ANALYSIS_PERIOD", "1y")
  const surfaceGridSize = yield* Config.integer("SURFACE_GRID_SIZE").pipe(
    Config.withDefault(10)
  )
  const priceFetchConcurrency = yield* Config.integer("PRICE_FETCH_CONCURRENCY").pipe(
    Config.withDefault(3)
  )
  const maxRetries = yield* Config.integer("MAX_RETRIES").pipe(
    Config.withDefault(2)
  )
  const retryBaseDelayMillis = yield* Config.integer("RETRY_BASE_DELAY_MS").pipe(
    Config.withDefault(1000)
  )
  const cacheTtlSeconds = yield* Config.number("CACHE_TTL_SECONDS").pipe(
    Config.withDefault(3600)
  )
  const httpPort = yield* Config.integer("PORT").pipe(Config.withDefault(8080))
  const portfolioPath = yield* Config.string("PORTFOLIO_PATH").pipe(
    Config.withDefault("./portfolio.json")
  )

  return {
    riskFreeRate,
    analysisPeriod,
    surfaceGridSize,
    priceFetchConcurrency,
    maxRetries,
    retryBaseDelayMillis,
    cacheTtlSeconds,
    httpPort,
    portfolioPath,
  } satisfies AppConfiguration
})

export const AppConfigLive = Layer.effect(AppConfig, loadConfig)

// ─── Test Implementation (hardcoded defaults) ──────────────────

export const testConfiguration: AppConfiguration = {
  riskFreeRate: 0.05,
  analysisPeriod: { label: "1y", days: 365 },
  surfaceGridSize: 10,
  priceFetchConcurrency: 2,
  maxRetries: 1,
  retryBaseDelayMillis: 1,
  cacheTtlSeconds: 60,
  httpPort: 0,
  portfolioPath: "./portfolio.json",
}

export const AppConfigTest = Layer.succeed(AppConfig, testConfiguration)
