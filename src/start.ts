import { defineCommand } from "citty"
import consola from "consola"

import type { ShutdownReport } from "./daemon/types"
import { DEFAULT_SHUTDOWN_TIMEOUT_MS, parsePort } from "./lib/config"
import { serve } from "./serve"
import { server } from "./server"

interface RunServerOptions {
  // Falls back to PORT, then 8080
  port?: number
  hostname?: string
  shutdownTimeoutMs: number
  forceClose: boolean
  verbose: boolean
}

export async function runServer(
  options: RunServerOptions,
): Promise<ShutdownReport> {
  if (options.verbose) {
    consola.level = 5
    consola.info("Verbose logging enabled")
  }

  return serve(server.fetch, {
    port: options.port,
    hostname: options.hostname,
    shutdownTimeoutMs: options.shutdownTimeoutMs,
    forceCloseOnTimeout: options.forceClose,
  })
}

export function parseTimeout(raw: string): number {
  const value = /^\d+$/.test(raw.trim()) ? Number.parseInt(raw, 10) : Number.NaN
  if (Number.isNaN(value)) {
    throw new Error(`Invalid timeout: ${JSON.stringify(raw)}`)
  }
  return value
}

export const start = defineCommand({
  meta: {
    name: "start",
    description: "Serve the demo app until SIGINT or SIGTERM",
  },
  args: {
    port: {
      alias: "p",
      type: "string",
      description: "Port to listen on (defaults to $PORT, then 8080)",
    },
    hostname: {
      type: "string",
      description: "Interface to bind (defaults to all interfaces)",
    },
    timeout: {
      alias: "t",
      type: "string",
      default: String(DEFAULT_SHUTDOWN_TIMEOUT_MS),
      description: "Milliseconds to wait for in-flight requests on shutdown",
    },
    "force-close": {
      type: "boolean",
      default: false,
      description: "Destroy open connections when the shutdown timeout expires",
    },
    verbose: {
      alias: "v",
      type: "boolean",
      default: false,
      description: "Enable verbose logging",
    },
  },
  async run({ args }) {
    let port: number | undefined
    let shutdownTimeoutMs: number
    try {
      port = args.port === undefined ? undefined : parsePort(args.port)
      shutdownTimeoutMs = parseTimeout(args.timeout)
    } catch (err) {
      consola.error(err instanceof Error ? err.message : String(err))
      process.exitCode = 1
      return
    }

    const report = await runServer({
      port,
      hostname: args.hostname,
      shutdownTimeoutMs,
      forceClose: args["force-close"],
      verbose: args.verbose,
    })

    if (report.outcome === "failed") process.exitCode = 1
  },
})
