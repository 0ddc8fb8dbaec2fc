// ─── CLI Arguments ─────────────────────────────────────────────
// Turns `command --flag=value ...` into typed request values.
// Pure: every malformed flag is an InvalidParameter on the left
// of an Either, so the entry point reports it like any other
// analytics error.

import { Either, Option } from "effect"
import { InvalidParameter } from "./domain/errors.js"
import type { LookbackWindow, MarketParameters, SurfaceBounds } from "./domain/models.js"
import { parseLookback } from "./domain/window.js"

export const COMMANDS = ["option", "stats", "market", "portfolio", "serve"] as const
export type Command = (typeof COMMANDS)[number]

export interface CliArgs {
  readonly command: Command
  /** `--name=value`; a bare `--name` is stored as "true". */
  readonly flags: ReadonlyMap<string, string>
  readonly positionals: readonly string[]
}

const isCommand = (word: string): word is Command =>
  COMMANDS.some((c) => c === word)

export function parseArgs(argv: readonly string[]): Either.Either<CliArgs, InvalidParameter> {
  const flags = new Map<string, string>()
  const words: string[] = []

  for (const arg of argv) {
    if (arg.startsWith("--")) {
      const eq = arg.indexOf("=")
      if (eq === -1) flags.set(arg.slice(2), "true")
      else flags.set(arg.slice(2, eq), arg.slice(eq + 1))
    } else {
      words.push(arg)
    }
  }

  const [first, ...positionals] = words
  if (first === undefined) return Either.right({ command: "portfolio", flags, positionals })
  if (!isCommand(first)) {
    return Either.left(
      new InvalidParameter({
        parameter: "command",
        reason: `unknown command "${first}" (expected one of ${COMMANDS.join(", ")})`,
      })
    )
  }
  return Either.right({ command: first, flags, positionals })
}

export const hasFlag = (args: CliArgs, name: string): boolean =>
  args.flags.get(name) === "true"

// ─── Typed Flags ───────────────────────────────────────────────

export function numberFlag(
  args: CliArgs,
  name: string
): Either.Either<Option.Option<number>, InvalidParameter> {
  const raw = args.flags.get(name)
  if (raw === undefined) return Either.right(Option.none())
  const value = Number(raw)
  if (raw.trim() === "" || !Number.isFinite(value)) {
    return Either.left(new InvalidParameter({ parameter: name, reason: `not a number: "${raw}"` }))
  }
  return Either.right(Option.some(value))
}

const requiredNumber = (args: CliArgs, name: string) =>
  Either.flatMap(numberFlag(args, name), (value) =>
    Option.match(value, {
      onNone: () =>
        Either.left(new InvalidParameter({ parameter: name, reason: `--${name}=<number> is required` })),
      onSome: (n) => Either.right(n),
    })
  )

/** `--period=6mo`, `--period=90` or `--days=90`. */
export function lookbackFlag(
  args: CliArgs
): Either.Either<Option.Option<LookbackWindow>, InvalidParameter> {
  const raw = args.flags.get("period") ?? args.flags.get("days")
  if (raw === undefined) return Either.right(Option.none())
  return Option.match(parseLookback(raw), {
    onNone: () =>
      Either.left(
        new InvalidParameter({ parameter: "period", reason: `not a lookback period: "${raw}"` })
      ),
    onSome: (window) => Either.right(Option.some(window)),
  })
}

/** Symbols from `--symbols=A,B` followed by any positional words. */
export function symbolsArg(args: CliArgs): Either.Either<readonly string[], InvalidParameter> {
  const listed = (args.flags.get("symbols") ?? "")
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0)
  const symbols = [...listed, ...args.positionals]
  if (symbols.length === 0) {
    return Either.left(
      new InvalidParameter({ parameter: "symbols", reason: "name at least one symbol" })
    )
  }
  return Either.right(symbols)
}

// ─── Option Command ────────────────────────────────────────────

export interface OptionRequest {
  readonly params: MarketParameters
  readonly bounds: Option.Option<SurfaceBounds>
}

const SURFACE_FLAGS = ["min-spot", "max-spot", "min-vol", "max-vol"] as const

export function optionRequest(
  args: CliArgs,
  defaultRate: number
): Either.Either<OptionRequest, InvalidParameter> {
  return Either.gen(function* () {
    const spot = yield* requiredNumber(args, "spot")
    const strike = yield* requiredNumber(args, "strike")
    const maturity = yield* requiredNumber(args, "maturity")
    const volatility = yield* requiredNumber(args, "vol")
    const rate = Option.getOrElse(yield* numberFlag(args, "rate"), () => defaultRate)
    const params: MarketParameters = { spot, strike, maturity, rate, volatility }

    const given = SURFACE_FLAGS.filter((name) => args.flags.has(name))
    if (given.length === 0) return { params, bounds: Option.none() }
    if (given.length < SURFACE_FLAGS.length) {
      return yield* Either.left(
        new InvalidParameter({
          parameter: "surface",
          reason: `give all of ${SURFACE_FLAGS.map((f) => `--${f}`).join(", ")} or none`,
        })
      )
    }

    const bounds: SurfaceBounds = {
      minSpot: yield* requiredNumber(args, "min-spot"),
      maxSpot: yield* requiredNumber(args, "max-spot"),
      minVolatility: yield* requiredNumber(args, "min-vol"),
      maxVolatility: yield* requiredNumber(args, "max-vol"),
    }
    return { params, bounds: Option.some(bounds) }
  })
}

export const USAGE = `Usage:
  option    --spot= --strike= --maturity= --vol= [--rate=] [--min-spot= --max-spot= --min-vol= --max-vol=]
  stats     <SYMBOL> [--period=1y]
  market    --symbols=AAPL,MSFT,BTC [--period=6mo]
  portfolio [--portfolio=./portfolio.json] [--period=1y] [--rate=0.05]
  serve     [--port=8080]

  --demo    use deterministic synthetic prices instead of the network`
