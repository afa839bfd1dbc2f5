import type { AddressInfo } from "node:net"

import type { Middleware, RequestHandler } from "~/access-log"
import type { Env, ServerConfigOptions } from "~/lib/config"

import type { SignalTarget } from "./signals"

export type LifecycleState =
  | "idle"
  | "starting"
  | "listening"
  | "draining"
  | "stopped"

export type ListenOutcome =
  | { kind: "closed" }
  | { kind: "error"; error: Error }

export interface Listener {
  // Resolves once the socket is bound; rejects if binding fails
  ready: () => Promise<void>
  // Settles exactly once with the listener's terminal outcome; never rejects
  readonly completion: Promise<ListenOutcome>
  address: () => AddressInfo | string | null
  // Stop accepting connections and close once in-flight requests finish
  shutdown: () => void
  destroyConnections: () => void
}

export interface ListenOptions {
  port: number
  hostname?: string
}

export type ListenFn = (handler: RequestHandler, opts: ListenOptions) => Listener

export type ShutdownHook = () => Promise<void> | void

export type ShutdownTrigger =
  | NodeJS.Signals
  | "abort"
  | "listener-error"
  | "config-error"

export interface ShutdownReport {
  trigger: ShutdownTrigger
  outcome: "closed" | "timeout" | "failed"
  // Listener or configuration failure, when there was one
  error?: Error
  // From the shutdown trigger to the end of the race; 0 when nothing drained
  durationMs: number
}

export interface CoordinatorOptions {
  middleware?: Middleware
  signals?: ReadonlyArray<NodeJS.Signals>
  signalTarget?: SignalTarget
  listen?: ListenFn
  abortSignal?: AbortSignal
  hooks?: Array<ShutdownHook>
}

export interface ServeOptions extends ServerConfigOptions, CoordinatorOptions {
  env?: Env
}
