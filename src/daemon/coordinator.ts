import consola from "consola"
import type { AddressInfo } from "node:net"

import { accessLog, type Middleware, type RequestHandler } from "~/access-log"
import type { ServerConfig } from "~/lib/config"
import { createDeferred } from "~/lib/deferred"
import { toError } from "~/lib/errors"

import { listenWithSrvx } from "./listener"
import { subscribeToSignals, TERMINATION_SIGNALS } from "./signals"
import type {
  CoordinatorOptions,
  LifecycleState,
  ListenFn,
  ListenOutcome,
  Listener,
  ShutdownHook,
  ShutdownReport,
  ShutdownTrigger,
} from "./types"

type WaitResult =
  | { kind: "signal"; trigger: NodeJS.Signals | "abort" }
  | { kind: "listener"; outcome: ListenOutcome }

// Owns one run of a listener: signal subscription, start, and the bounded
// shutdown race. Instances are single-use.
export class ShutdownCoordinator {
  private state: LifecycleState = "idle"
  private hooks: Array<ShutdownHook> = []
  private readonly middleware: Middleware
  private readonly listen: ListenFn

  constructor(
    private readonly config: ServerConfig,
    private readonly opts: CoordinatorOptions = {},
  ) {
    this.middleware = opts.middleware ?? accessLog()
    this.listen = opts.listen ?? listenWithSrvx
    for (const hook of opts.hooks ?? []) this.registerHook(hook)
  }

  // Hooks run concurrently with draining and share its deadline
  registerHook(hook: ShutdownHook) {
    this.hooks.push(hook)
  }

  getState() {
    return this.state
  }

  /**
   * Serve until a termination signal (or the abort signal) arrives, then
   * drain within `shutdownTimeoutMs`. Resolves with a report; failures of
   * the listener are logged and reported, never thrown.
   */
  async run(handler: RequestHandler): Promise<ShutdownReport> {
    if (this.state !== "idle") {
      throw new Error(`Cannot run from state ${this.state}`)
    }
    this.state = "starting"

    // Subscribe before binding so a signal during startup is not lost
    const subscription = subscribeToSignals(
      this.opts.signals ?? TERMINATION_SIGNALS,
      this.opts.signalTarget,
    )

    let listener: Listener
    try {
      listener = this.listen(this.middleware(handler), {
        port: this.config.port,
        hostname: this.config.hostname,
      })
    } catch (err) {
      subscription.dispose()
      const error = toError(err)
      consola.error("Failed to start listener:", error)
      return this.finish({
        trigger: "listener-error",
        outcome: "failed",
        error,
        durationMs: 0,
      })
    }

    consola.info(`Begin listening on port ${this.config.port}`)
    this.state = "listening"
    void listener.ready().then(
      () => consola.debug(`Listening on ${describeAddress(listener.address())}`),
      // Reported through the completion channel below
      (err: unknown) => consola.debug("Listener did not bind:", err),
    )

    const abort = this.watchAbort()
    const waited = await Promise.race<WaitResult>([
      subscription.received.then((signal) => ({
        kind: "signal" as const,
        trigger: signal,
      })),
      abort.promise.then(() => ({
        kind: "signal" as const,
        trigger: "abort" as const,
      })),
      listener.completion.then((outcome) => ({
        kind: "listener" as const,
        outcome,
      })),
    ])
    subscription.dispose()
    abort.dispose()

    if (waited.kind === "listener") {
      const error =
        waited.outcome.kind === "error" ?
          waited.outcome.error
        : new Error("Listener closed before shutdown was requested")
      consola.error("Listener failed:", error)
      // Nothing is serving; settle the socket in case it is half-open
      listener.shutdown()
      return this.finish({
        trigger: "listener-error",
        outcome: "failed",
        error,
        durationMs: 0,
      })
    }

    return this.beginShutdown(listener, waited.trigger)
  }

  private async beginShutdown(
    listener: Listener,
    trigger: ShutdownTrigger,
  ): Promise<ShutdownReport> {
    this.state = "draining"
    consola.info(`Shutting down server (${trigger})...`)
    const startedAt = performance.now()

    listener.shutdown()
    const hooksSettled = Promise.allSettled(
      this.hooks.map(async (hook) => {
        try {
          await hook()
        } catch (err) {
          consola.warn("Shutdown hook failed:", err)
        }
      }),
    )

    const timeoutMs = this.config.shutdownTimeoutMs
    let timer: ReturnType<typeof setTimeout> | undefined
    const timeout = new Promise<"timeout">((resolve) => {
      timer = setTimeout(() => resolve("timeout"), timeoutMs)
    })

    let outcome: ListenOutcome | "timeout"
    try {
      outcome = await Promise.race([
        Promise.all([listener.completion, hooksSettled]).then(
          ([completion]) => completion,
        ),
        timeout,
      ])
    } finally {
      clearTimeout(timer)
    }

    const durationMs = performance.now() - startedAt

    if (outcome === "timeout") {
      consola.warn(`Graceful shutdown timed out after ${timeoutMs}ms`)
      if (this.config.forceCloseOnTimeout) {
        consola.warn("Destroying remaining connections")
        listener.destroyConnections()
      }
      return this.finish({ trigger, outcome: "timeout", durationMs })
    }

    if (outcome.kind === "error") {
      consola.warn("Finished listening:", outcome.error)
      return this.finish({
        trigger,
        outcome: "closed",
        error: outcome.error,
        durationMs,
      })
    }

    consola.info("Finished listening: server closed")
    return this.finish({ trigger, outcome: "closed", durationMs })
  }

  private finish(report: ShutdownReport): ShutdownReport {
    this.state = "stopped"
    consola.info("Server stopped")
    return report
  }

  private watchAbort(): { promise: Promise<void>; dispose: () => void } {
    const signal = this.opts.abortSignal
    const aborted = createDeferred<void>()
    if (!signal) return { promise: aborted.promise, dispose: () => {} }
    if (signal.aborted) {
      aborted.resolve()
      return { promise: aborted.promise, dispose: () => {} }
    }

    const onAbort = () => aborted.resolve()
    signal.addEventListener("abort", onAbort, { once: true })
    return {
      promise: aborted.promise,
      dispose: () => signal.removeEventListener("abort", onAbort),
    }
  }
}

function describeAddress(address: AddressInfo | string | null): string {
  if (address === null) return "unknown address"
  if (typeof address === "string") return address
  const host = address.family === "IPv6" ? `[${address.address}]` : address.address
  return `${host}:${address.port}`
}
