import { RateLimitError, RetriesExhaustedError } from "./errors"
import { logger } from "./logger"

export const DEFAULT_MAX_ATTEMPTS = 8
const MAX_BACKOFF_SECONDS = 30

export type RetryOptions = {
  /** Total calls allowed, including the first one. */
  maxAttempts?: number
  /** Injectable for testing. */
  sleep?: (ms: number) => Promise<void>
  isRateLimit?: (error: unknown) => boolean
  /** Context merged into retry log lines. */
  context?: Record<string, unknown>
}

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms))

export function isRateLimitError(error: unknown): boolean {
  return error instanceof RateLimitError
}

/**
 * Extracts a server-suggested wait such as "Please try again in 558ms." from an error
 * message. Only whole milliseconds are recognised; anything else returns null.
 */
export function parseSuggestedWaitMs(message: string): number | null {
  const match = /try again in\s*(\d+)\s*ms/i.exec(message)
  if (!match?.[1]) return null
  return Number.parseInt(match[1], 10)
}

/**
 * Exponential backoff for the given zero-based attempt: 1s, 2s, 4s, … capped at 30s.
 */
export function backoffDelayMs(attempt: number): number {
  return Math.min(2 ** attempt, MAX_BACKOFF_SECONDS) * 1000
}

function errorText(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 * Runs `call` until it succeeds, absorbing rate-limit failures only.
 *
 * - success: the value is returned at once
 * - rate limit: wait the server-suggested time when the message carries one, otherwise
 *   back off exponentially, then try again
 * - any other error: rethrown unchanged, no retry
 * - attempts used up: `RetriesExhaustedError` with the last rate-limit error as cause
 *
 * There is no wait after the final attempt.
 */
export async function withRetries<T>(call: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS
  const wait = options.sleep ?? sleep
  const isRateLimit = options.isRateLimit ?? isRateLimitError
  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new Error("maxAttempts must be a positive integer")
  }

  let lastError: unknown
  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    try {
      return await call()
    } catch (err) {
      if (!isRateLimit(err)) {
        logger.error({ ...options.context, error: err }, "Non-rate-limit error during API call")
        throw err
      }
      lastError = err
      const message = errorText(err)
      logger.warn({ ...options.context, attempt: attempt + 1, maxAttempts }, `Rate limit hit: ${message}`)
      if (attempt === maxAttempts - 1) break

      const suggested = parseSuggestedWaitMs(message)
      if (suggested !== null) {
        logger.warn({ ...options.context, waitMs: suggested }, "Waiting (from API suggestion)")
        await wait(suggested)
        continue
      }

      const delay = backoffDelayMs(attempt)
      logger.warn({ ...options.context, waitMs: delay }, "Retrying (exponential backoff)")
      await wait(delay)
    }
  }

  throw new RetriesExhaustedError(maxAttempts, lastError)
}
