import consola from "consola"

import type { RequestHandler } from "./access-log"
import { ShutdownCoordinator } from "./daemon/coordinator"
import type { ServeOptions, ShutdownReport } from "./daemon/types"
import { resolveServerConfig } from "./lib/config"
import { toError } from "./lib/errors"

/**
 * Serve `handler` on `PORT` (8080 when unset) until SIGINT or SIGTERM, then
 * shut down gracefully. Requests are access-logged unless `middleware`
 * replaces the default logger.
 *
 * Never rejects: configuration and listener failures are logged and show up
 * in the returned report. Exiting the process is left to the caller.
 */
export async function serve(
  handler: RequestHandler,
  options: ServeOptions = {},
): Promise<ShutdownReport> {
  const { env, port, hostname, shutdownTimeoutMs, forceCloseOnTimeout, ...rest } =
    options

  let coordinator: ShutdownCoordinator
  try {
    const config = resolveServerConfig(
      { port, hostname, shutdownTimeoutMs, forceCloseOnTimeout },
      env,
    )
    coordinator = new ShutdownCoordinator(config, rest)
  } catch (err) {
    const error = toError(err)
    consola.error("Invalid server configuration:", error.message)
    return { trigger: "config-error", outcome: "failed", error, durationMs: 0 }
  }

  return coordinator.run(handler)
}
