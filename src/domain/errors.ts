// ─── Analytics Errors ──────────────────────────────────────────
// Every failure the pure core can report. Each error carries a
// `_tag`, so callers branch on the union exhaustively instead of
// matching message strings.

import { Data } from "effect"

/** Malformed or out-of-domain numeric input to the pricer, grid or portfolio. */
export class InvalidParameter extends Data.TaggedError("InvalidParameter")<{
  readonly parameter: string
  readonly reason: string
}> {
  get message(): string {
    return `Invalid ${this.parameter}: ${this.reason}`
  }
}

/** A single series is too short to produce statistics. */
export class InsufficientData extends Data.TaggedError("InsufficientData")<{
  readonly symbol: string
  readonly observations: number
  readonly required: number
}> {
  get message(): string {
    return `Not enough data for ${this.symbol}: ${this.observations} observation(s), need ${this.required}`
  }
}

/** Price history is absent or unusable for one or more portfolio symbols. */
export class MissingData extends Data.TaggedError("MissingData")<{
  readonly symbols: readonly string[]
  readonly reason: string
  /** True when the source was unreachable, so asking again may succeed. */
  readonly retriable: boolean
}> {
  get message(): string {
    return `Missing data for ${this.symbols.join(", ")}: ${this.reason}`
  }
}

/** A series breaks an invariant the math depends on (e.g. a non-positive close). */
export class DataIntegrity extends Data.TaggedError("DataIntegrity")<{
  readonly symbol: string
  readonly reason: string
}> {
  get message(): string {
    return `Data integrity violation in ${this.symbol}: ${this.reason}`
  }
}

export class DivisionByZero extends Data.TaggedError("DivisionByZero")<{
  readonly quantity: string
  readonly reason: string
}> {
  get message(): string {
    return `Cannot compute ${this.quantity}: ${this.reason}`
  }
}

export type AnalyticsError =
  | InvalidParameter
  | InsufficientData
  | MissingData
  | DataIntegrity
  | DivisionByZero
