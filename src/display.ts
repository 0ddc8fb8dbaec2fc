// ─── Display ───────────────────────────────────────────────────
// Formats analytics results for terminal output.
// Uses ANSI escape codes for colour (no external dependencies).
// This module is pure: it takes data in and returns a string.

import type { AnalyticsError } from "./domain/errors.js"
import type {
  AssetStatistics,
  OptionSurface,
  PortfolioReport,
  SymbolMatrix,
} from "./domain/models.js"
import type { StoreError } from "./services/PortfolioStore.js"
import type { MarketSnapshot } from "./workflows/asset.js"
import type { OptionValuation } from "./workflows/options.js"

// ─── ANSI Colours ──────────────────────────────────────────────

const B = "\x1b[1m"
const D = "\x1b[2m"
const R = "\x1b[31m"
const G = "\x1b[32m"
const Y = "\x1b[33m"
const C = "\x1b[36m"
const X = "\x1b[0m"

const W = 62

// ─── Formatting Helpers ────────────────────────────────────────

const fmtUsd = (n: number): string =>
  "$" + n.toLocaleString("en-US", { minimumFractionDigits: 2, maximumFractionDigits: 2 })

/** Values already expressed in percent. */
const fmtPct = (n: number): string => n.toFixed(2) + "%"

const colourChange = (pct: number): string =>
  pct >= 0 ? `${G}+${pct.toFixed(2)}%${X}` : `${R}${pct.toFixed(2)}%${X}`

const header = (title: string, subtitle?: string): string[] => {
  const lines = ["", `${B}${"═".repeat(W)}${X}`, `${B}  ${title}${X}`]
  if (subtitle !== undefined) lines.push(`${D}  ${subtitle}${X}`)
  lines.push(`${B}${"═".repeat(W)}${X}`)
  return lines
}

const section = (title: string): string[] => [
  "",
  `  ${B}${title}${X}`,
  `  ${D}${"─".repeat(W - 2)}${X}`,
]

const footer = (): string[] => ["", `${B}${"═".repeat(W)}${X}`, ""]

// ─── Options ───────────────────────────────────────────────────

export function renderSurface(surface: OptionSurface, leg: "call" | "put"): string {
  const prices = leg === "call" ? surface.call : surface.put
  const lines: string[] = []

  lines.push(
    `  ${D}` +
      "Spot \\ Vol".padEnd(11) +
      surface.volatilities.map((v) => `${(v * 100).toFixed(0)}%`.padStart(8)).join("") +
      X
  )
  surface.spots.forEach((spot, i) => {
    lines.push(
      "  " +
        spot.toFixed(2).padEnd(11) +
        prices[i].map((p) => p.toFixed(2).padStart(8)).join("")
    )
  })

  return lines.join("\n")
}

export function renderOptionValuation(valuation: OptionValuation): string {
  const { parameters: p, quote, surface } = valuation
  const lines = header("Black-Scholes Option Valuation")

  lines.push(...section("PARAMETERS"))
  lines.push(`  Spot:                  ${fmtUsd(p.spot)}`)
  lines.push(`  Strike:                ${fmtUsd(p.strike)}`)
  lines.push(`  Maturity:              ${p.maturity} y`)
  lines.push(`  Risk-free rate:        ${fmtPct(p.rate * 100)}`)
  lines.push(`  Volatility:            ${fmtPct(p.volatility * 100)}`)

  lines.push(...section("PRICES"))
  lines.push(`  Call:                  ${C}${fmtUsd(quote.call)}${X}`)
  lines.push(`  Put:                   ${C}${fmtUsd(quote.put)}${X}`)

  if (surface) {
    lines.push(...section("CALL SURFACE"))
    lines.push(renderSurface(surface, "call"))
    lines.push(...section("PUT SURFACE"))
    lines.push(renderSurface(surface, "put"))
  }

  lines.push(...footer())
  return lines.join("\n")
}

// ─── Asset Statistics ──────────────────────────────────────────

const statisticsHeader = (): string =>
  `  ${D}` +
  "Symbol".padEnd(10) +
  "Price".padStart(13) +
  "Return".padStart(11) +
  "Vol".padStart(10) +
  "Obs".padStart(6) +
  "  Last".padStart(10) +
  X

const statisticsRow = (s: AssetStatistics): string =>
  "  " +
  s.symbol.padEnd(10) +
  fmtUsd(s.currentPrice).padStart(13) +
  fmtPct(s.annualizedReturn).padStart(11) +
  fmtPct(s.annualizedVolatility).padStart(10) +
  String(s.observations).padStart(6) +
  "  " +
  colourChange(s.periodChange)

export function renderAssetStatistics(stats: AssetStatistics, periodLabel: string): string {
  const lines = header(`Asset Statistics: ${stats.symbol}`, `Lookback ${periodLabel}`)

  lines.push("")
  lines.push(`  Current price:         ${C}${fmtUsd(stats.currentPrice)}${X}`)
  lines.push(`  Last change:           ${colourChange(stats.periodChange)}`)
  lines.push(`  Period return:         ${fmtPct(stats.annualizedReturn)}`)
  lines.push(`  Volatility (ann.):     ${fmtPct(stats.annualizedVolatility)}`)
  lines.push(`  ${D}Observations: ${stats.observations}${X}`)

  lines.push(...footer())
  return lines.join("\n")
}

export function renderMarketSnapshot(snapshot: MarketSnapshot, periodLabel: string): string {
  const lines = header("Market Statistics", `Lookback ${periodLabel}`)

  lines.push(...section("ASSETS"))
  lines.push(statisticsHeader())
  for (const s of snapshot.statistics) lines.push(statisticsRow(s))

  if (snapshot.failures.length > 0) {
    lines.push(...section("UNAVAILABLE"))
    for (const f of snapshot.failures) {
      lines.push(`  ${Y}${f.symbol.padEnd(10)}${X}${D}${f.error.message}${X}`)
    }
  }

  lines.push(...footer())
  return lines.join("\n")
}

// ─── Portfolio ─────────────────────────────────────────────────

const renderMatrix = (matrix: SymbolMatrix, digits: number): string[] => {
  const lines = [
    `  ${D}` + "".padEnd(10) + matrix.symbols.map((s) => s.padStart(10)).join("") + X,
  ]
  matrix.values.forEach((row, i) => {
    lines.push(
      "  " +
        matrix.symbols[i].padEnd(10) +
        row.map((v) => v.toFixed(digits).padStart(10)).join("")
    )
  })
  return lines
}

export function renderPortfolioReport(report: PortfolioReport, name?: string): string {
  const { metrics, period, generatedAt } = report
  const lines = header(
    name === undefined ? "Portfolio Risk" : `Portfolio Risk: ${name}`,
    `Lookback ${period.label} · ${metrics.observations} aligned returns · ${generatedAt}`
  )

  lines.push("")
  lines.push(`  ${B}PORTFOLIO VALUE${X}              ${C}${fmtUsd(metrics.totalValue)}${X}`)

  lines.push(...section("RISK METRICS"))
  lines.push(`  Expected return (ann.): ${fmtPct(metrics.expectedReturn)}`)
  lines.push(`  Volatility (ann.):      ${fmtPct(metrics.volatility)}`)
  lines.push(
    `  Sharpe ratio:           ${metrics.sharpeRatio >= 0 ? G : R}${metrics.sharpeRatio.toFixed(3)}${X}`
  )

  lines.push(...section("HOLDINGS"))
  lines.push(
    `  ${D}` +
      "Symbol".padEnd(10) +
      "Shares".padStart(10) +
      "Price".padStart(12) +
      "Value".padStart(13) +
      "Weight".padStart(8) +
      "Return".padStart(10) +
      X
  )
  for (const h of metrics.holdings) {
    lines.push(
      "  " +
        h.symbol.padEnd(10) +
        String(h.shares).padStart(10) +
        fmtUsd(h.currentPrice).padStart(12) +
        fmtUsd(h.value).padStart(13) +
        fmtPct(h.weight * 100).padStart(8) +
        fmtPct(h.annualizedReturn).padStart(10)
    )
  }

  lines.push(...section("CORRELATION"))
  lines.push(...renderMatrix(metrics.correlation, 3))

  lines.push(...footer())
  return lines.join("\n")
}

// ─── Errors ────────────────────────────────────────────────────

export type RenderableError = AnalyticsError | StoreError

export function renderError(error: RenderableError): string {
  switch (error._tag) {
    case "InvalidParameter":
      return `${R}Invalid input:${X} ${error.parameter}: ${error.reason}`
    case "InsufficientData":
      return `${Y}Not enough history:${X} ${error.symbol} has ${error.observations} observation(s), ${error.required} required`
    case "MissingData":
      return `${error.retriable ? R : Y}No price data:${X} ${error.symbols.join(", ")} (${error.reason})`
    case "DataIntegrity":
      return `${R}Bad price data:${X} ${error.symbol}: ${error.reason}`
    case "DivisionByZero":
      return `${R}Undefined result:${X} ${error.quantity}: ${error.reason}`
    case "StoreError":
      return `${R}Portfolio file:${X} ${error.reason}`
  }
}
