import http from "node:http"
import net from "node:net"

import type { Listener, ListenOutcome } from "~/daemon/types"
import { createDeferred, type Deferred } from "~/lib/deferred"

// Reserve a loopback port and release it for the code under test
export function getFreePort(): Promise<number> {
  return new Promise((resolve, reject) => {
    const probe = net.createServer()
    probe.once("error", reject)
    probe.listen(0, "127.0.0.1", () => {
      const address = probe.address()
      if (address === null || typeof address === "string") {
        probe.close()
        reject(new Error("Probe server has no TCP address"))
        return
      }
      probe.close(() => resolve(address.port))
    })
  })
}

export interface SimpleResponse {
  status: number
  body: string
}

// agent: false sends "Connection: close", so no keep-alive socket outlives
// the response and holds up server.close()
export function get(port: number, path: string): Promise<SimpleResponse> {
  return new Promise((resolve, reject) => {
    const req = http.get(
      { host: "127.0.0.1", port, path, agent: false },
      (res) => {
        let body = ""
        res.setEncoding("utf8")
        res.on("data", (chunk: string) => {
          body += chunk
        })
        res.on("end", () => resolve({ status: res.statusCode ?? 0, body }))
      },
    )
    req.on("error", reject)
  })
}

export interface FakeListener {
  listener: Listener
  completion: Deferred<ListenOutcome>
  calls: { shutdown: number; destroyConnections: number }
}

// In-memory Listener; the test decides when (and how) it completes
export function createFakeListener(
  onShutdown?: (completion: Deferred<ListenOutcome>) => void,
): FakeListener {
  const completion = createDeferred<ListenOutcome>()
  const calls = { shutdown: 0, destroyConnections: 0 }

  const listener: Listener = {
    ready: async () => {},
    completion: completion.promise,
    address: () => ({ address: "127.0.0.1", family: "IPv4", port: 8080 }),
    shutdown: () => {
      calls.shutdown += 1
      onShutdown?.(completion)
    },
    destroyConnections: () => {
      calls.destroyConnections += 1
    },
  }

  return { listener, completion, calls }
}

export const sleep = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms))
