import { describe, expect, test, vi } from "vitest"

import { pollWithCeiling } from "../src/daemon/bounded-poll"

describe("pollWithCeiling", () => {
  test("settles on the first tick that yields a value", async () => {
    const sleep = vi.fn(async (_ms: number) => {})
    const onExhausted = vi.fn(async () => "escalated")

    const result = await pollWithCeiling({
      maxAttempts: 5,
      intervalMs: 1000,
      sleep,
      check: async (attempt) => (attempt === 3 ? "ready" : undefined),
      onExhausted,
    })

    expect(result).toEqual({ settled: true, value: "ready", attempts: 3 })
    expect(sleep).toHaveBeenCalledTimes(3)
    expect(sleep).toHaveBeenCalledWith(1000)
    expect(onExhausted).not.toHaveBeenCalled()
  })

  test("calls onExhausted exactly once after the ceiling", async () => {
    const sleep = vi.fn(async (_ms: number) => {})
    const check = vi.fn(async () => undefined)
    const onExhausted = vi.fn(async () => [7, 8])

    const result = await pollWithCeiling<true, Array<number>>({
      maxAttempts: 4,
      intervalMs: 250,
      sleep,
      check,
      onExhausted,
    })

    expect(result).toEqual({ settled: false, escalation: [7, 8], attempts: 4 })
    expect(check).toHaveBeenCalledTimes(4)
    expect(sleep).toHaveBeenCalledTimes(4)
    expect(onExhausted).toHaveBeenCalledTimes(1)
  })

  test("propagates errors from check", async () => {
    await expect(
      pollWithCeiling({
        maxAttempts: 3,
        intervalMs: 1,
        sleep: async () => {},
        check: async () => {
          throw new Error("lsof failed")
        },
        onExhausted: async () => null,
      }),
    ).rejects.toThrow("lsof failed")
  })

  test("waits in real time when no sleep is given", async () => {
    const started = Date.now()

    await pollWithCeiling({
      maxAttempts: 2,
      intervalMs: 20,
      check: async () => undefined,
      onExhausted: async () => null,
    })

    expect(Date.now() - started).toBeGreaterThanOrEqual(35)
  })
})
