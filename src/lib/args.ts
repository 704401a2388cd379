import { Command } from "commander"
import { DEFAULT_MODEL, isTokenLimitParam, type TokenLimitParam } from "../config/models"
import { DEFAULT_PROMPT_VARIANTS, isPromptVariant, PROMPT_VARIANTS, type PromptVariant } from "../config/prompts"
import { DEFAULT_MAX_ATTEMPTS } from "./retry"

export const DEFAULT_TARGET_FOLDERS = ["person", "car", "dog", "cat", "chair"]

export type RunArgs = {
  groundTruthPath: string
  imageRoot: string
  outDir: string
  model: string
  folders: string[]
  prompts: PromptVariant[]
  maxAttempts: number
  concurrency: number
  tokenLimitParam?: TokenLimitParam
  maxTokens?: number
  cacheRoot?: string
  logFile?: string
}

export type EvaluateArgs = {
  resultsDir: string
  outDir: string
  logFile?: string
}

export type CasesArgs = {
  resultsDir: string
  model: string
  base: PromptVariant
  misleading: PromptVariant
  mitigation: PromptVariant
  limit: number
  outDir: string
  logFile?: string
}

export type CommandHandlers = {
  run: (args: RunArgs) => Promise<void>
  evaluate: (args: EvaluateArgs) => Promise<void>
  cases: (args: CasesArgs) => Promise<void>
}

function csvList(value: unknown): string[] {
  return String(value ?? "")
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean)
}

function positiveInt(name: string, value: unknown): number {
  const n = Number(value)
  if (!Number.isInteger(n) || n < 1) {
    throw new Error(`Invalid ${name}: ${String(value)}. Must be a positive integer.`)
  }
  return n
}

function nonEmpty(name: string, value: unknown): string {
  const s = String(value ?? "").trim()
  if (!s) {
    throw new Error(`${name} cannot be empty`)
  }
  return s
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() ? value.trim() : undefined
}

function promptVariant(name: string, value: unknown): PromptVariant {
  if (!isPromptVariant(value)) {
    throw new Error(`Invalid ${name}: ${String(value)}. Expected one of: ${PROMPT_VARIANTS.join(", ")}`)
  }
  return value
}

/**
 * Validates the options of the `run` command.
 * @param opts - Raw options as parsed by commander.
 * @throws Error if an option is invalid.
 */
export function parseRunOptions(opts: Record<string, unknown>): RunArgs {
  const folders = csvList(opts.folders)
  if (folders.length === 0) {
    throw new Error("At least one target folder must be specified")
  }

  const prompts = csvList(opts.prompts).map((p) => promptVariant("prompt", p))
  if (prompts.length === 0) {
    throw new Error("At least one prompt variant must be specified")
  }

  let tokenLimitParam: TokenLimitParam | undefined
  if (opts.tokenLimitParam !== undefined) {
    if (!isTokenLimitParam(opts.tokenLimitParam)) {
      throw new Error(
        `Invalid token limit parameter: ${String(opts.tokenLimitParam)}. Expected max_tokens or max_completion_tokens.`,
      )
    }
    tokenLimitParam = opts.tokenLimitParam
  }

  return {
    groundTruthPath: nonEmpty("Ground truth path", opts.groundTruth),
    imageRoot: nonEmpty("Image root", opts.images),
    outDir: nonEmpty("Output directory", opts.out),
    model: nonEmpty("Model", opts.model),
    folders,
    prompts,
    maxAttempts: positiveInt("max attempts", opts.maxAttempts),
    concurrency: positiveInt("concurrency", opts.concurrency),
    tokenLimitParam,
    maxTokens: opts.maxTokens === undefined ? undefined : positiveInt("max tokens", opts.maxTokens),
    cacheRoot: opts.cache === false ? undefined : nonEmpty("Cache directory", opts.cacheDir),
    logFile: optionalString(opts.logFile),
  }
}

export function parseEvaluateOptions(opts: Record<string, unknown>): EvaluateArgs {
  return {
    resultsDir: nonEmpty("Results directory", opts.results),
    outDir: nonEmpty("Output directory", opts.out),
    logFile: optionalString(opts.logFile),
  }
}

export function parseCasesOptions(opts: Record<string, unknown>): CasesArgs {
  return {
    resultsDir: nonEmpty("Results directory", opts.results),
    model: nonEmpty("Model", opts.model),
    base: promptVariant("base prompt", opts.base),
    misleading: promptVariant("misleading prompt", opts.misleading),
    mitigation: promptVariant("mitigation prompt", opts.mitigation),
    limit: positiveInt("limit", opts.limit),
    outDir: nonEmpty("Output directory", opts.out),
    logFile: optionalString(opts.logFile),
  }
}

/**
 * Builds the CLI. Each command validates its options and hands them to its handler.
 * @param handlers - Command implementations.
 */
export function buildProgram(handlers: CommandHandlers): Command {
  const program = new Command()
    .name("visionbench")
    .description("Measure object hallucination of vision models under different prompt phrasings")
    .showHelpAfterError()

  program
    .command("run")
    .description("Query the model once per (image, absent object, prompt variant) and save the answers")
    .option("--ground-truth <path>", "Ground truth CSV (foldername, filename, no)", "GroundTruth.csv")
    .option("--images <dir>", "Image root; images live at <dir>/<foldername>/<filename>", "images")
    .option("--out <dir>", "Directory for result collections", "results")
    .option("--model <id>", "OpenRouter model ID", DEFAULT_MODEL)
    .option("--folders <csv>", "Comma-separated folders to run", DEFAULT_TARGET_FOLDERS.join(","))
    .option("--prompts <csv>", `Comma-separated prompt variants (${PROMPT_VARIANTS.join(", ")})`, DEFAULT_PROMPT_VARIANTS.join(","))
    .option("--max-attempts <n>", "Attempts per request before giving up on rate limits", String(DEFAULT_MAX_ATTEMPTS))
    .option("--concurrency <n>", "Requests in flight", "1")
    .option("--token-limit-param <name>", "Override the token limit field: max_tokens | max_completion_tokens")
    .option("--max-tokens <n>", "Override the output token cap")
    .option("--cache-dir <dir>", "Answer cache directory", ".cache")
    .option("--no-cache", "Do not read or write the answer cache")
    .option("--log-file <path>", "Also append logs to this file")
    .action((opts: Record<string, unknown>) => handlers.run(parseRunOptions(opts)))

  program
    .command("evaluate")
    .description("Compute hallucination rates from saved result collections")
    .option("--results <dir>", "Directory of result collections", "results")
    .option("--out <dir>", "Directory for CSV tables and the markdown report", "evaluation_outputs")
    .option("--log-file <path>", "Also append logs to this file")
    .action((opts: Record<string, unknown>) => handlers.evaluate(parseEvaluateOptions(opts)))

  program
    .command("cases")
    .description("Find probes whose answer flipped between the base prompt and another variant")
    .option("--results <dir>", "Directory of result collections", "results")
    .option("--model <id>", "Model whose records are compared", DEFAULT_MODEL)
    .option("--base <variant>", "Reference prompt variant", "baseline")
    .option("--misleading <variant>", "Variant checked for induced hallucinations", "misleading1")
    .option("--mitigation <variant>", "Variant checked for corrected hallucinations", "mitigate1")
    .option("--limit <n>", "Examples printed per case", "5")
    .option("--out <dir>", "Directory for the case CSVs", ".")
    .option("--log-file <path>", "Also append logs to this file")
    .action((opts: Record<string, unknown>) => handlers.cases(parseCasesOptions(opts)))

  return program
}
