import { Hono } from "hono"

// Upper bound for /sleep
export const MAX_SLEEP_MS = 60_000

// Demo app served by the CLI. It has no logging of its own: access logs
// come from the middleware the coordinator wraps around `fetch`.
export const server = new Hono()

server.get("/", (c) => c.text("Server running"))

// Responds after the requested delay; useful for watching in-flight
// requests drain during shutdown
server.get("/sleep/:ms", async (c) => {
  const raw = c.req.param("ms")
  const ms = /^\d+$/.test(raw) ? Number.parseInt(raw, 10) : Number.NaN
  if (!Number.isInteger(ms) || ms > MAX_SLEEP_MS) {
    return c.json(
      { error: `ms must be an integer between 0 and ${MAX_SLEEP_MS}` },
      400,
    )
  }

  await new Promise((r) => setTimeout(r, ms))
  return c.text(`Slept ${ms}ms`)
})
