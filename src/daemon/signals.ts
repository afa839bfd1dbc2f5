export const TERMINATION_SIGNALS: ReadonlyArray<NodeJS.Signals> = [
  "SIGINT",
  "SIGTERM",
]

type SignalListener = (signal: NodeJS.Signals) => void

// The slice of `process` used for subscriptions; tests hand in an EventEmitter
export interface SignalTarget {
  once: (signal: NodeJS.Signals, listener: SignalListener) => unknown
  removeListener: (signal: NodeJS.Signals, listener: SignalListener) => unknown
}

export interface SignalSubscription {
  // Resolves with the first signal delivered
  readonly received: Promise<NodeJS.Signals>
  dispose: () => void
}

/**
 * Subscribe to a set of signals for a single notification. Every listener
 * installed here is removed once a signal arrives or `dispose` is called, so
 * later deliveries fall through to the process default.
 */
export function subscribeToSignals(
  signals: ReadonlyArray<NodeJS.Signals> = TERMINATION_SIGNALS,
  target: SignalTarget = process,
): SignalSubscription {
  const listeners = new Map<NodeJS.Signals, SignalListener>()

  const dispose = () => {
    for (const [signal, listener] of listeners) {
      target.removeListener(signal, listener)
    }
    listeners.clear()
  }

  const received = new Promise<NodeJS.Signals>((resolve) => {
    for (const signal of new Set(signals)) {
      const listener: SignalListener = () => {
        dispose()
        resolve(signal)
      }
      listeners.set(signal, listener)
      target.once(signal, listener)
    }
  })

  return { received, dispose }
}
