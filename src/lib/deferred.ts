export interface Deferred<T> {
  readonly promise: Promise<T>
  // Later calls after the first are ignored
  resolve: (value: T) => void
}

// Single-slot completion channel: carries one value, observed by any number
// of awaiters, written at most once.
export function createDeferred<T>(): Deferred<T> {
  let settled = false
  let settle: (value: T) => void = () => {}

  const promise = new Promise<T>((resolve) => {
    settle = resolve
  })

  return {
    promise,
    resolve: (value) => {
      if (settled) return
      settled = true
      settle(value)
    },
  }
}
