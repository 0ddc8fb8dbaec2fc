#!/usr/bin/env node
// ─── Entry Point ───────────────────────────────────────────────
// This is the single boundary where the effectful world meets
// the real world. All services are wired via Layer composition
// and the Effect runtime executes the program here.
//
// Usage:
//   npm start -- option --spot=100 --strike=110 --maturity=1 --vol=0.2
//   npm start -- stats AAPL --period=6mo
//   npm start -- market --symbols=AAPL,MSFT,BTC
//   npm start -- portfolio --portfolio=my.json
//   npm start -- serve --port=8080
//   Add --demo to any command to use synthetic prices (no network).
//
// Environment variables (all optional, sensible defaults):
//   RISK_FREE_RATE             Annual risk-free rate (default: 0.05)
//   ANALYSIS_PERIOD            Lookback for statistics (default: 1y)
//   SURFACE_GRID_SIZE          Points per surface axis (default: 10)
//   PRICE_FETCH_CONCURRENCY    Concurrent historical price fetches (default: 3)
//   MAX_RETRIES                Retry attempts on source failure (default: 2)
//   RETRY_BASE_DELAY_MS        First retry delay (default: 1000)
//   CACHE_TTL_SECONDS          Result cache lifetime, 0 disables (default: 3600)
//   PORT                       HTTP port for `serve` (default: 8080)
//   PORTFOLIO_PATH             Path to portfolio JSON (default: ./portfolio.json)
//   LOG_LEVEL                  debug | info | warn | error (default: info)

import { ConfigError, Effect, Layer, Option, Runtime } from "effect"
import {
  USAGE,
  hasFlag,
  lookbackFlag,
  numberFlag,
  optionRequest,
  parseArgs,
  symbolsArg,
  type CliArgs,
} from "./cli.js"
import {
  renderAssetStatistics,
  renderError,
  renderMarketSnapshot,
  renderOptionValuation,
  renderPortfolioReport,
} from "./display.js"
import { createApp, type HandlerEnv } from "./http/server.js"
import { AppConfig, AppConfigLive } from "./services/AppConfig.js"
import { ClockLive } from "./services/Clock.js"
import { Logger, LoggerLive } from "./services/Logger.js"
import { PortfolioStore, PortfolioStoreLive } from "./services/PortfolioStore.js"
import { PriceHistoryLive, PriceHistoryTest } from "./services/PriceHistory.js"
import { ResultCacheLive } from "./services/ResultCache.js"
import { analyseAsset, analyseMarket } from "./workflows/asset.js"
import { priceOption } from "./workflows/options.js"
import { analysePortfolio } from "./workflows/portfolio.js"

// ─── Layer Composition ─────────────────────────────────────────
// Each service is an independent, swappable building block:
//   PriceHistoryLive → Stooq / CryptoCompare HTTP (PriceHistoryTest with --demo)
//   PortfolioStoreLive → filesystem (swap to PortfolioStoreTest for in-memory)
//   LoggerLive → console (swap to LoggerSilent for tests)
//   AppConfigLive → environment variables (swap to AppConfigTest for defaults)
//   ClockLive → system clock (swap to ClockTest for fixed time)
// The result cache is built on top of config and clock.

const appLayer = (demo: boolean) =>
  ResultCacheLive.pipe(
    Layer.provideMerge(
      Layer.mergeAll(
        AppConfigLive,
        ClockLive,
        LoggerLive,
        PortfolioStoreLive,
        demo ? PriceHistoryTest : PriceHistoryLive
      )
    )
  )

const print = (text: string) => Effect.sync(() => console.log(text))

// ─── Commands ──────────────────────────────────────────────────

const optionCommand = (args: CliArgs) =>
  Effect.gen(function* () {
    const config = yield* AppConfig
    const request = yield* optionRequest(args, config.riskFreeRate)
    const valuation = yield* priceOption(request.params, Option.getOrUndefined(request.bounds))
    yield* print(renderOptionValuation(valuation))
  })

const statsCommand = (args: CliArgs) =>
  Effect.gen(function* () {
    const config = yield* AppConfig
    const window = Option.getOrElse(yield* lookbackFlag(args), () => config.analysisPeriod)
    const [symbol] = yield* symbolsArg(args)
    const statistics = yield* analyseAsset(symbol, window)
    yield* print(renderAssetStatistics(statistics, window.label))
  })

const marketCommand = (args: CliArgs) =>
  Effect.gen(function* () {
    const config = yield* AppConfig
    const window = Option.getOrElse(yield* lookbackFlag(args), () => config.analysisPeriod)
    const symbols = yield* symbolsArg(args)
    const snapshot = yield* analyseMarket(symbols, window)
    yield* print(renderMarketSnapshot(snapshot, window.label))
  })

const portfolioCommand = (args: CliArgs) =>
  Effect.gen(function* () {
    const store = yield* PortfolioStore
    const logger = yield* Logger
    const config = yield* AppConfig

    // CLI path takes precedence over the env var
    const portfolioPath = args.flags.get("portfolio") ?? config.portfolioPath

    yield* logger.info("Loading portfolio", { path: portfolioPath })
    const portfolio = yield* store.loadPortfolio(portfolioPath)
    yield* logger.info("Portfolio loaded", {
      name: portfolio.name,
      holdings: portfolio.holdings.length,
    })

    const report = yield* analysePortfolio({
      holdings: portfolio.holdings,
      window: Option.getOrUndefined(yield* lookbackFlag(args)),
      riskFreeRate: Option.getOrUndefined(yield* numberFlag(args, "rate")),
    })
    yield* print(renderPortfolioReport(report, portfolio.name))
  })

// ─── HTTP Server ───────────────────────────────────────────────
// Handlers run on the runtime of this program, so they share its
// services (and its result cache). Runs until interrupted.

const serveCommand = (args: CliArgs) =>
  Effect.gen(function* () {
    const config = yield* AppConfig
    const logger = yield* Logger
    const port = Option.getOrElse(yield* numberFlag(args, "port"), () => config.httpPort)

    const runtime = yield* Effect.runtime<HandlerEnv>()
    const app = createApp(Runtime.runPromise(runtime))

    yield* logger.info("Starting HTTP server", { port })
    return yield* Effect.async<never>((resume) => {
      const server = app.listen(port)
      server.on("error", (cause) => resume(Effect.die(cause)))
      return Effect.sync(() => {
        server.close()
      })
    })
  })

const runCommand = (args: CliArgs) =>
  Effect.gen(function* () {
    switch (args.command) {
      case "option":
        return yield* optionCommand(args)
      case "stats":
        return yield* statsCommand(args)
      case "market":
        return yield* marketCommand(args)
      case "portfolio":
        return yield* portfolioCommand(args)
      case "serve":
        return yield* serveCommand(args)
    }
  })

// ─── Program ───────────────────────────────────────────────────

const program = Effect.gen(function* () {
  const args = yield* parseArgs(process.argv.slice(2))
  if (hasFlag(args, "help")) return yield* print(USAGE)
  yield* runCommand(args).pipe(Effect.provide(appLayer(hasFlag(args, "demo"))))
}).pipe(
  Effect.catchAll((error) =>
    Effect.sync(() => {
      console.error(
        ConfigError.isConfigError(error)
          ? `Configuration error: ${String(error)}`
          : renderError(error)
      )
      process.exitCode = 1
    })
  )
)

// ─── Runtime ───────────────────────────────────────────────────
// The single call to Effect.runPromise: the edge of the world.
// Everything above is a description of what to do. This line
// actually does it.

Effect.runPromise(program).catch((error) => {
  console.error("\nFatal error:", error)
  process.exit(1)
})
