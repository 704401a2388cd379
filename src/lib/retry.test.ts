import { describe, expect, it, vi } from "vitest"
import { RateLimitError, RetriesExhaustedError, TransportError } from "./errors"
import { backoffDelayMs, parseSuggestedWaitMs, withRetries } from "./retry"

function fakeSleep() {
  return vi.fn(async (_ms: number) => {})
}

describe("parseSuggestedWaitMs", () => {
  it("reads the millisecond hint from free text", () => {
    expect(parseSuggestedWaitMs("Rate limit reached. Please try again in 558ms. Visit ...")).toBe(558)
    expect(parseSuggestedWaitMs("try again in 250 ms")).toBe(250)
  })

  it("returns null when there is no millisecond hint", () => {
    expect(parseSuggestedWaitMs("Please try again in 1.5s")).toBeNull()
    expect(parseSuggestedWaitMs("Too many requests")).toBeNull()
  })
})

describe("backoffDelayMs", () => {
  it("doubles per attempt and caps at 30 seconds", () => {
    expect(backoffDelayMs(0)).toBe(1000)
    expect(backoffDelayMs(1)).toBe(2000)
    expect(backoffDelayMs(4)).toBe(16000)
    expect(backoffDelayMs(5)).toBe(30000)
    expect(backoffDelayMs(9)).toBe(30000)
  })
})

describe("withRetries", () => {
  it("returns the first success without sleeping", async () => {
    const sleep = fakeSleep()
    const call = vi.fn(async () => "yes")

    await expect(withRetries(call, { sleep })).resolves.toBe("yes")
    expect(call).toHaveBeenCalledTimes(1)
    expect(sleep).not.toHaveBeenCalled()
  })

  it("honours the server-suggested wait", async () => {
    const sleep = fakeSleep()
    const call = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new RateLimitError("Rate limit reached, try again in 250ms"))
      .mockRejectedValueOnce(new RateLimitError("Rate limit reached, try again in 250ms"))
      .mockResolvedValueOnce("no")

    await expect(withRetries(call, { sleep, maxAttempts: 5 })).resolves.toBe("no")
    expect(call).toHaveBeenCalledTimes(3)
    expect(sleep.mock.calls).toEqual([[250], [250]])
  })

  it("propagates other errors on the first attempt", async () => {
    const sleep = fakeSleep()
    const fault = new TransportError("401 Unauthorized")
    const call = vi.fn(async () => {
      throw fault
    })

    await expect(withRetries(call, { sleep })).rejects.toBe(fault)
    expect(call).toHaveBeenCalledTimes(1)
    expect(sleep).not.toHaveBeenCalled()
  })

  it("backs off exponentially and raises RetriesExhaustedError", async () => {
    const sleep = fakeSleep()
    const call = vi.fn(async () => {
      throw new RateLimitError("Too many requests")
    })

    const err = await withRetries(call, { sleep, maxAttempts: 3 }).catch((e: unknown) => e)
    expect(err).toBeInstanceOf(RetriesExhaustedError)
    expect(err).not.toBeInstanceOf(TransportError)
    expect(call).toHaveBeenCalledTimes(3)
    expect(sleep.mock.calls).toEqual([[1000], [2000]])
    if (err instanceof RetriesExhaustedError) {
      expect(err.attempts).toBe(3)
      expect(err.code).toBe("RETRIES_EXHAUSTED")
      expect(err.cause).toBeInstanceOf(RateLimitError)
    }
  })

  it("mixes suggested waits and backoff by attempt index", async () => {
    const sleep = fakeSleep()
    const call = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new RateLimitError("slow down"))
      .mockRejectedValueOnce(new RateLimitError("try again in 40ms"))
      .mockRejectedValueOnce(new RateLimitError("slow down"))
      .mockResolvedValueOnce("yes")

    await expect(withRetries(call, { sleep })).resolves.toBe("yes")
    expect(sleep.mock.calls).toEqual([[1000], [40], [4000]])
  })

  it("accepts a custom rate-limit predicate", async () => {
    const sleep = fakeSleep()
    const call = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error("429 try again in 5ms"))
      .mockResolvedValueOnce("ok")

    const isRateLimit = (e: unknown) => e instanceof Error && e.message.startsWith("429")
    await expect(withRetries(call, { sleep, isRateLimit })).resolves.toBe("ok")
    expect(sleep.mock.calls).toEqual([[5]])
  })

  it("rejects a non-positive attempt budget", async () => {
    await expect(withRetries(async () => "x", { maxAttempts: 0 })).rejects.toThrow("maxAttempts")
  })
})
