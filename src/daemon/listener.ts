import consola from "consola"
import http from "node:http"
import { serve } from "srvx"
import invariant from "tiny-invariant"

import { createDeferred } from "~/lib/deferred"
import { toError } from "~/lib/errors"

import type { ListenFn, ListenOutcome } from "./types"

// Default listener: an srvx server on Node's http module. The completion
// channel resolves on the server's "close" event, or with the first error
// it emits (EADDRINUSE, EACCES, ...).
export const listenWithSrvx: ListenFn = (handler, opts) => {
  const serverOptions = {
    fetch: handler,
    port: opts.port,
    hostname: opts.hostname,
    // Lifecycle output belongs to the coordinator
    silent: true,
  }
  const server = serve(serverOptions)

  const nodeServer = server.node?.server
  invariant(
    nodeServer instanceof http.Server,
    "srvx did not create a Node.js HTTP server",
  )

  const completion = createDeferred<ListenOutcome>()
  nodeServer.on("error", (error: Error) => {
    completion.resolve({ kind: "error", error })
  })
  nodeServer.once("close", () => {
    completion.resolve({ kind: "closed" })
  })

  let shuttingDown = false

  return {
    ready: () =>
      Promise.race([
        server.ready().then(() => undefined),
        completion.promise.then((outcome) => {
          if (outcome.kind === "error") throw outcome.error
        }),
      ]),
    completion: completion.promise,
    address: () => nodeServer.address(),
    shutdown: () => {
      if (shuttingDown) return
      shuttingDown = true
      server.close().catch((err: unknown) => {
        // close() fails when the socket never bound; that error was
        // already delivered through "error"
        consola.debug("Listener close failed:", err)
        completion.resolve({ kind: "error", error: toError(err) })
      })
    },
    destroyConnections: () => {
      nodeServer.closeAllConnections()
    },
  }
}
