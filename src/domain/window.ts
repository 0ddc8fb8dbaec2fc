// ─── Lookback Windows ──────────────────────────────────────────
// Named periods ("6mo", "1 year", ...) or explicit day counts,
// resolved to calendar days.

import { Option } from "effect"
import type { LookbackWindow, PricePoint } from "./models.js"

const MS_PER_DAY = 24 * 60 * 60 * 1000

const UNIT_DAYS: Record<string, (count: number) => number> = {
  d: (n) => n,
  w: (n) => n * 7,
  mo: (n) => Math.round((n * 365) / 12),
  y: (n) => n * 365,
}

const PERIOD_PATTERN = /^(\d+)\s*(d|days?|w|weeks?|mo|months?|y|years?)$/

const unitKey = (unit: string): string =>
  unit.startsWith("mo") ? "mo" : unit.charAt(0)

export const windowOfDays = (days: number): LookbackWindow => ({
  label: `${days}d`,
  days,
})

/** Accepts "6mo", "1y", "6 months", "5 years", "90" or 90. */
export function parseLookback(input: string | number): Option.Option<LookbackWindow> {
  if (typeof input === "number") {
    return Number.isInteger(input) && input > 0
      ? Option.some(windowOfDays(input))
      : Option.none()
  }

  const text = input.trim().toLowerCase()
  if (/^\d+$/.test(text)) return parseLookback(Number(text))

  const match = PERIOD_PATTERN.exec(text)
  if (match === null) return Option.none()
  const count = Number(match[1])
  const toDays = UNIT_DAYS[unitKey(match[2])]
  if (count <= 0 || toDays === undefined) return Option.none()
  return Option.some({ label: text, days: toDays(count) })
}

/**
 * Keeps the points no more than `window.days` calendar days before
 * `end`, which defaults to the last point. Points after `end` are
 * dropped. Input order is preserved.
 */
export function applyWindow(
  points: readonly PricePoint[],
  window: LookbackWindow,
  end?: number
): readonly PricePoint[] {
  if (points.length === 0) return points
  const last = end ?? points[points.length - 1].timestamp
  const cutoff = last - window.days * MS_PER_DAY
  return points.filter((p) => p.timestamp >= cutoff && p.timestamp <= last)
}
