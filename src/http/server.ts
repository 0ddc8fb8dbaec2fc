// ─── HTTP Surface ──────────────────────────────────────────────
// A thin express adapter over the handlers. Routes translate
// requests into handler effects and run them on the application
// runtime; no analytics logic lives here.

import express, { type NextFunction, type Request, type Response } from "express"
import type { Effect } from "effect"
import { handleAssetStatistics } from "./handlers.js"

export type HandlerEnv = Effect.Effect.Context<ReturnType<typeof handleAssetStatistics>>

/** Runs a handler effect on the application runtime. */
export type Runner = <A>(effect: Effect.Effect<A, never, HandlerEnv>) => Promise<A>

export function createApp(run: Runner) {
  const app = express()
  app.use(express.json({ limit: "100kb" }))

  app.get("/health", (_req: Request, res: Response) => {
    res.json({ ok: true, uptime_s: Math.round(process.uptime()) })
  })

  // POST /asset-statistics  { symbol, period_in_days }
  app.post("/asset-statistics", (req: Request, res: Response, next: NextFunction) => {
    run(handleAssetStatistics(req.body))
      .then(({ status, body }) => {
        res.status(status).json(body)
      })
      .catch(next)
  })

  app.use((req: Request, res: Response) => {
    res.status(404).json({ error: `Not found: ${req.method} ${req.originalUrl}` })
  })

  // body-parser marks malformed JSON with a 4xx `status`
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status =
      typeof err === "object" && err !== null && "status" in err && typeof err.status === "number"
        ? err.status
        : 500
    res
      .status(status)
      .json({ error: status < 500 ? "Malformed request body" : "Internal server error" })
  })

  return app
}
