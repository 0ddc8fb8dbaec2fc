// ─── Statistical Helpers ───────────────────────────────────────
// Pure numeric building blocks shared by the pricer, the asset
// statistics helper and the portfolio engine.

export const TRADING_DAYS_PER_YEAR = 252

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0
  return values.reduce((sum, v) => sum + v, 0) / values.length
}

/** Sample (n − 1) covariance. Fewer than two pairs have no dispersion. */
export function sampleCovariance(
  xs: readonly number[],
  ys: readonly number[]
): number {
  const n = Math.min(xs.length, ys.length)
  if (n < 2) return 0
  const mx = mean(xs.slice(0, n))
  const my = mean(ys.slice(0, n))
  let acc = 0
  for (let i = 0; i < n; i++) {
    acc += (xs[i] - mx) * (ys[i] - my)
  }
  return acc / (n - 1)
}

export function sampleStdDev(values: readonly number[]): number {
  return Math.sqrt(sampleCovariance(values, values))
}

export function simpleReturns(prices: readonly number[]): number[] {
  const returns: number[] = []
  for (let i = 1; i < prices.length; i++) {
    returns.push((prices[i] - prices[i - 1]) / prices[i - 1])
  }
  return returns
}

/** ln(Pt / Pt−1). Callers guarantee strictly positive prices. */
export function logReturns(prices: readonly number[]): number[] {
  const returns: number[] = []
  for (let i = 1; i < prices.length; i++) {
    returns.push(Math.log(prices[i] / prices[i - 1]))
  }
  return returns
}

/** `count` evenly spaced values from `start` to `end`, both inclusive. */
export function linspace(start: number, end: number, count: number): number[] {
  if (count === 1) return [start]
  const step = (end - start) / (count - 1)
  return Array.from({ length: count }, (_, i) =>
    i === count - 1 ? end : start + i * step
  )
}

// ─── Normal Distribution ───────────────────────────────────────
// Abramowitz & Stegun 7.1.26 (|ε| < 1.5e-7), Φ(x) = (1 + erf(x/√2)) / 2.
// Evaluated on |x| and reflected, so Φ(x) + Φ(−x) = 1.

const A1 = 0.254829592
const A2 = -0.284496736
const A3 = 1.421413741
const A4 = -1.453152027
const A5 = 1.061405429
const P = 0.3275911

export function normalCdf(x: number): number {
  const sign = x < 0 ? -1 : 1
  const z = Math.abs(x) / Math.SQRT2
  const t = 1 / (1 + P * z)
  const erf =
    1 - ((((A5 * t + A4) * t + A3) * t + A2) * t + A1) * t * Math.exp(-z * z)
  return 0.5 * (1 + sign * erf)
}
