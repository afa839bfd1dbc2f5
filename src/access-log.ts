import consola from "consola"

export type RequestHandler = (request: Request) => Response | Promise<Response>

// Decorates a handler; the coordinator applies one before binding
export type Middleware = (next: RequestHandler) => RequestHandler

export interface AccessLogEntry {
  method: string
  // Path plus query string, e.g. "/search?q=1"
  path: string
  userAgent: string
  // Absent when the handler threw
  status?: number
  durationMs: number
}

export type AccessLogWriter = (entry: AccessLogEntry) => void

export interface AccessLogOptions {
  write?: AccessLogWriter
}

export function formatDuration(ms: number): string {
  return ms < 1000 ? `${Math.round(ms)}ms` : `${Math.round(ms / 1000)}s`
}

export function formatAccessLog(entry: AccessLogEntry): string {
  return `Served ${entry.path} for ${JSON.stringify(entry.userAgent)} in ${formatDuration(entry.durationMs)}`
}

const defaultWriter: AccessLogWriter = (entry) => {
  consola.info(formatAccessLog(entry))
}

function requestPath(request: Request): string {
  try {
    const url = new URL(request.url)
    return url.pathname + url.search
  } catch {
    return request.url
  }
}

/**
 * Wrap a handler so every request it serves produces one access-log entry.
 * The response is passed through untouched and a throwing handler still
 * rethrows after its entry is written.
 */
export function wrap(
  handler: RequestHandler,
  options: AccessLogOptions = {},
): RequestHandler {
  const write = options.write ?? defaultWriter

  return async (request) => {
    const start = performance.now()
    let status: number | undefined
    try {
      const response = await handler(request)
      status = response.status
      return response
    } finally {
      const durationMs = performance.now() - start
      try {
        write({
          method: request.method,
          path: requestPath(request),
          userAgent: request.headers.get("user-agent") ?? "",
          status,
          durationMs,
        })
      } catch (err) {
        consola.warn("Access log writer failed:", err)
      }
    }
  }
}

export function accessLog(options: AccessLogOptions = {}): Middleware {
  return (next) => wrap(next, options)
}
