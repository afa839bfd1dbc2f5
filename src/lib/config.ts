export const DEFAULT_PORT = 8080
export const DEFAULT_SHUTDOWN_TIMEOUT_MS = 5000
// Longest delay setTimeout holds; larger values fire after 1ms
export const MAX_SHUTDOWN_TIMEOUT_MS = 2_147_483_647

export interface ServerConfig {
  readonly port: number
  readonly hostname?: string
  // Upper bound on the wait for in-flight requests once shutdown begins
  readonly shutdownTimeoutMs: number
  // Destroy the remaining connections when the timeout wins the race
  readonly forceCloseOnTimeout: boolean
}

export interface ServerConfigOptions {
  port?: number | string
  hostname?: string
  shutdownTimeoutMs?: number
  forceCloseOnTimeout?: boolean
}

export type Env = Record<string, string | undefined>

/**
 * Resolve the listener configuration. An explicit `port` wins over `PORT`
 * from the environment; an absent or empty `PORT` falls back to 8080.
 *
 * Throws when the port or timeout cannot be used.
 */
export function resolveServerConfig(
  options: ServerConfigOptions = {},
  env: Env = process.env,
): ServerConfig {
  const envPort = env.PORT?.trim()
  const rawPort = options.port ?? (envPort ? envPort : DEFAULT_PORT)
  const port = parsePort(rawPort)

  const shutdownTimeoutMs =
    options.shutdownTimeoutMs ?? DEFAULT_SHUTDOWN_TIMEOUT_MS
  if (
    !Number.isFinite(shutdownTimeoutMs)
    || shutdownTimeoutMs < 0
    || shutdownTimeoutMs > MAX_SHUTDOWN_TIMEOUT_MS
  ) {
    throw new Error(`Invalid shutdown timeout: ${shutdownTimeoutMs}`)
  }

  return Object.freeze({
    port,
    hostname: options.hostname,
    shutdownTimeoutMs,
    forceCloseOnTimeout: options.forceCloseOnTimeout ?? false,
  })
}

export function parsePort(value: number | string): number {
  const port =
    typeof value === "number" ? value
    : /^\d+$/.test(value.trim()) ? Number.parseInt(value.trim(), 10)
    : Number.NaN

  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`Invalid port: ${JSON.stringify(value)}`)
  }
  return port
}
