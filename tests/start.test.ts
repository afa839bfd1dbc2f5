import consola from "consola"
import { afterEach, beforeEach, expect, test, vi } from "vitest"

import { parseTimeout, runServer } from "../src/start"

const originalLevel = consola.level

beforeEach(() => {
  consola.mockTypes(() => vi.fn())
})

afterEach(() => {
  vi.unstubAllEnvs()
  consola.level = originalLevel
})

test("parseTimeout accepts whole milliseconds only", () => {
  expect(parseTimeout("250")).toBe(250)
  expect(parseTimeout("0")).toBe(0)
  expect(() => parseTimeout("1.5")).toThrow('Invalid timeout: "1.5"')
  expect(() => parseTimeout("soon")).toThrow('Invalid timeout: "soon"')
})

test("runServer reports an unusable PORT instead of throwing", async () => {
  vi.stubEnv("PORT", "http")

  const report = await runServer({
    shutdownTimeoutMs: 100,
    forceClose: false,
    verbose: true,
  })

  expect(consola.level).toBe(5)
  expect(report.trigger).toBe("config-error")
  expect(report.outcome).toBe("failed")
})
