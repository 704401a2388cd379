import pino, { type Logger } from "pino"

const isProduction = process.env.NODE_ENV === "production"
const isTest = process.env.NODE_ENV === "test" || process.env.VITEST === "true"
const prettyTransport = {
  target: "pino-pretty",
  options: {
    colorize: true,
    translateTime: "HH:MM:ss",
    ignore: "pid,hostname",
    destination: 2,
  },
}

const baseOptions = {
  level: process.env.LOG_LEVEL || "info",
  serializers: {
    error: pino.stdSerializers.err,
  },
}

/**
 * Builds a logger writing to stderr and, when `logFile` is given, appending to that file
 * as well.
 */
export function createLogger(logFile?: string): Logger {
  const usePretty = !isProduction && !isTest
  if (!logFile) {
    return usePretty
      ? pino({ ...baseOptions, transport: prettyTransport })
      : pino(baseOptions, pino.destination(2))
  }

  const primaryStream = usePretty ? pino.transport(prettyTransport) : pino.destination(2)
  const fileStream = pino.destination({
    dest: logFile,
    append: true,
    mkdir: true,
    sync: false,
  })

  return pino(baseOptions, pino.multistream([{ stream: primaryStream }, { stream: fileStream }]))
}

export type { Logger }

export let logger: Logger = createLogger(process.env.LOG_FILE)

/**
 * Swaps the module logger, e.g. once the CLI knows the `--log-file` destination.
 */
export function setLogger(next: Logger) {
  logger = next
}
