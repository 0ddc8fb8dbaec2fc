// ─── Clock Service ─────────────────────────────────────────────
// Effect: Time observation
// Report stamps and cache expiry read time through this service,
// so tests can pin or advance it.

import { Context, Effect, Layer } from "effect"

// ─── Service Definition ────────────────────────────────────────

export class Clock extends Context.Tag("@analytics/Clock")<
  Clock,
  {
    readonly nowMillis: () => Effect.Effect<number>
    readonly nowIso: () => Effect.Effect<string>
  }
>() {}

// ─── Live Implementation (system clock) ────────────────────────

export const ClockLive = Layer.succeed(Clock, {
  nowMillis: () => Effect.sync(() => Date.now()),
  nowIso: () => Effect.sync(() => new Date().toISOString()),
})

// ─── Test Implementations ──────────────────────────────────────

export const makeClockTest = (fixedDate: Date) =>
  Layer.succeed(Clock, {
    nowMillis: () => Effect.succeed(fixedDate.getTime()),
    nowIso: () => Effect.succeed(fixedDate.toISOString()),
  })

export const ClockTest = makeClockTest(new Date("2026-01-15T12:00:00.000Z"))

/** A clock tests move forward by hand. */
export const makeManualClock = (startMillis: number) => {
  let current = startMillis
  return {
    advance: (millis: number) => {
      current += millis
    },
    layer: Layer.succeed(Clock, {
      nowMillis: () => Effect.sync(() => current),
      nowIso: () => Effect.sync(() => new Date(current).toISOString()),
    }),
  }
}
