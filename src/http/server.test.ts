import type { Server } from "node:http"
import { Layer, ManagedRuntime } from "effect"
import { afterAll, beforeAll, describe, expect, it } from "vitest"
import { AppConfigTest } from "../services/AppConfig.js"
import { ClockTest } from "../services/Clock.js"
import { LoggerSilent } from "../services/Logger.js"
import { PriceHistoryTest } from "../services/PriceHistory.js"
import { ResultCacheLive } from "../services/ResultCache.js"
import { createApp } from "./server.js"

// The app listens on an ephemeral loopback port inside the test process.
const runtime = ManagedRuntime.make(
  ResultCacheLive.pipe(
    Layer.provideMerge(Layer.mergeAll(AppConfigTest, ClockTest, LoggerSilent, PriceHistoryTest))
  )
)

let server: Server
let baseUrl = ""

beforeAll(async () => {
  const app = createApp((effect) => runtime.runPromise(effect))
  server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, "127.0.0.1", () => resolve(listening))
  })
  const address = server.address()
  if (address === null || typeof address === "string") throw new Error("expected a TCP address")
  baseUrl = `http://127.0.0.1:${address.port}`
})

afterAll(async () => {
  await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())))
  await runtime.dispose()
})

const post = (body: string) =>
  fetch(`${baseUrl}/asset-statistics`, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body,
  })

describe("HTTP surface", () => {
  it("reports health", async () => {
    const res = await fetch(`${baseUrl}/health`)
    expect(res.status).toBe(200)
    expect(await res.json()).toMatchObject({ ok: true })
  })

  it("serves asset statistics", async () => {
    const res = await post(JSON.stringify({ symbol: "AAPL", period_in_days: 90 }))
    expect(res.status).toBe(200)
    expect(await res.json()).toMatchObject({ symbol: "AAPL", observations: 91 })
  })

  it("answers malformed JSON with 400", async () => {
    const res = await post("{ not json")
    expect(res.status).toBe(400)
    expect(await res.json()).toEqual({ error: "Malformed request body" })
  })

  it("answers unknown routes with a JSON 404", async () => {
    const res = await fetch(`${baseUrl}/nowhere`)
    expect(res.status).toBe(404)
    expect(await res.json()).toEqual({ error: "Not found: GET /nowhere" })
  })
})
