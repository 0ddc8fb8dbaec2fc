// ─── ResultCache Service ───────────────────────────────────────
// Effect: Functional mutable state (Ref) + Time
//
// Memoizes boundary computations under an explicit key built from
// the full input tuple (lookback window included), so two requests
// that could produce different results never share an entry.
// Entries are immutable values that expire after the configured
// TTL; failures are never stored. Each cached operation gets its
// own typed store.

import { Context, Effect, Layer, Ref } from "effect"
import type { AssetStatistics, PortfolioReport } from "../domain/models.js"
import { AppConfig } from "./AppConfig.js"
import { Clock } from "./Clock.js"

// ─── Memo Store ────────────────────────────────────────────────

interface CacheEntry<A> {
  readonly value: A
  readonly expiresAtMs: number
}

export interface Memo<A> {
  readonly getOrCompute: <E, R>(
    key: readonly unknown[],
    compute: Effect.Effect<A, E, R>
  ) => Effect.Effect<A, E, R>
  readonly size: () => Effect.Effect<number>
  readonly clear: () => Effect.Effect<void>
}

export const cacheKeyOf = (key: readonly unknown[]): string => JSON.stringify(key)

const makeMemo = <A>(ttlMs: number, nowMillis: () => Effect.Effect<number>) =>
  Effect.gen(function* () {
    const entriesRef = yield* Ref.make<ReadonlyMap<string, CacheEntry<A>>>(new Map())

    const lookup = (id: string) =>
      Effect.gen(function* () {
        const now = yield* nowMillis()
        const entries = yield* Ref.get(entriesRef)
        const entry = entries.get(id)
        return entry !== undefined && entry.expiresAtMs > now ? entry : undefined
      })

    // Expired entries are swept on every write.
    const store = (id: string, value: A) =>
      Effect.gen(function* () {
        const now = yield* nowMillis()
        yield* Ref.update(entriesRef, (entries) => {
          const next = new Map<string, CacheEntry<A>>()
          for (const [k, e] of entries) {
            if (e.expiresAtMs > now) next.set(k, e)
          }
          next.set(id, { value, expiresAtMs: now + ttlMs })
          return next
        })
      })

    const memo: Memo<A> = {
      getOrCompute: (key, compute) =>
        Effect.gen(function* () {
          const id = cacheKeyOf(key)
          const hit = yield* lookup(id)
          if (hit !== undefined) return hit.value
          const value = yield* compute
          if (ttlMs > 0) yield* store(id, value)
          return value
        }),
      size: () => Effect.map(Ref.get(entriesRef), (entries) => entries.size),
      clear: () => Ref.set(entriesRef, new Map()),
    }
    return memo
  })

const passThrough = <A>(): Memo<A> => ({
  getOrCompute: (_key, compute) => compute,
  size: () => Effect.succeed(0),
  clear: () => Effect.void,
})

// ─── Service Definition ────────────────────────────────────────

export class ResultCache extends Context.Tag("@analytics/ResultCache")<
  ResultCache,
  {
    readonly assetStatistics: Memo<AssetStatistics>
    readonly portfolioReports: Memo<PortfolioReport>
  }
>() {}

// ─── Live Implementation (Ref-backed maps with TTL) ────────────

export const makeResultCache = Effect.gen(function* () {
  const config = yield* AppConfig
  const clock = yield* Clock
  const ttlMs = config.cacheTtlSeconds * 1000

  return {
    assetStatistics: yield* makeMemo<AssetStatistics>(ttlMs, clock.nowMillis),
    portfolioReports: yield* makeMemo<PortfolioReport>(ttlMs, clock.nowMillis),
  }
})

export const ResultCacheLive = Layer.effect(ResultCache, makeResultCache)

// ─── Pass-through Implementation (no memoization) ──────────────

export const ResultCacheDisabled = Layer.succeed(ResultCache, {
  assetStatistics: passThrough<AssetStatistics>(),
  portfolioReports: passThrough<PortfolioReport>(),
})
