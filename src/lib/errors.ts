interface BenchErrorOptions {
  code: string
  cause?: unknown
}

export class BenchError extends Error {
  readonly code: string

  constructor(message: string, { code, cause }: BenchErrorOptions) {
    super(message, { cause })
    this.code = code
    this.name = "BenchError"
  }
}

/**
 * The endpoint refused the call because of rate limiting. The message keeps the
 * server text so a suggested wait ("try again in 558ms") can be parsed from it.
 */
export class RateLimitError extends BenchError {
  constructor(message: string, cause?: unknown) {
    super(message, { code: "RATE_LIMITED", cause })
    this.name = "RateLimitError"
  }
}

export class TransportError extends BenchError {
  constructor(message: string, cause?: unknown) {
    super(message, { code: "TRANSPORT_FAULT", cause })
    this.name = "TransportError"
  }
}

export class RetriesExhaustedError extends BenchError {
  readonly attempts: number

  constructor(attempts: number, cause?: unknown) {
    super(`Max retries reached for API call (${attempts} attempts)`, {
      code: "RETRIES_EXHAUSTED",
      cause,
    })
    this.attempts = attempts
    this.name = "RetriesExhaustedError"
  }
}

export class MalformedGroundTruthError extends BenchError {
  readonly line: number

  constructor(message: string, line: number) {
    super(`${message} (line ${line})`, { code: "MALFORMED_GROUND_TRUTH" })
    this.line = line
    this.name = "MalformedGroundTruthError"
  }
}

export class InvalidResultFileError extends BenchError {
  readonly filePath: string

  constructor(filePath: string, message: string, cause?: unknown) {
    super(`Invalid result file ${filePath}: ${message}`, { code: "INVALID_RESULT_FILE", cause })
    this.filePath = filePath
    this.name = "InvalidResultFileError"
  }
}

export class UnknownModelError extends BenchError {
  constructor(modelId: string, known: readonly string[]) {
    super(
      `Unknown model "${modelId}". Known models: ${known.join(", ")}. Pass --token-limit-param and --max-tokens to run another model.`,
      { code: "UNKNOWN_MODEL" },
    )
    this.name = "UnknownModelError"
  }
}

/**
 * Renders an error and its cause chain on one line.
 */
export function formatError(error: unknown): string {
  if (!(error instanceof Error)) return String(error)
  const parts = [`${error.name}: ${error.message}`]
  if (error instanceof BenchError) parts.push(`code=${error.code}`)
  if (error.cause !== undefined) parts.push(`cause=${formatError(error.cause)}`)
  return parts.join(" | ")
}
