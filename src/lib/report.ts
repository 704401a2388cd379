import { mkdir, rename, rm, writeFile } from "node:fs/promises"
import path from "node:path"
import type { GroupKey, RateRow } from "./aggregate"
import type { TransitionCase } from "./cases"

export type EvaluationReportMeta = {
  timestampIso: string
  resultsDir: string
  files: string[]
  records: number
  duplicates: number
}

export type RateTables = {
  overall: RateRow<"model" | "prompt">[]
  object: RateRow<"model" | "prompt" | "object">[]
  folder: RateRow<"model" | "prompt" | "foldername">[]
}

/**
 * Formats a number as a percentage string with one decimal place.
 * @param x - The number to format (should be between 0 and 1).
 */
export function pct(x: number): string {
  if (typeof x !== "number" || isNaN(x)) {
    return "0.0%"
  }
  return `${(x * 100).toFixed(1)}%`
}

/**
 * Converts a string to a filesystem-safe slug.
 * Replaces invalid characters with underscores.
 * @param s - The string to convert.
 */
export function safeSlug(s: string): string {
  if (typeof s !== "string") {
    throw new Error("Input must be a string")
  }
  return s.replace(/[^a-zA-Z0-9._-]+/g, "_")
}

/**
 * Ensures a directory exists, creating it recursively if necessary.
 * @param dir - The directory path to ensure.
 */
export async function ensureDir(dir: string) {
  if (!dir || typeof dir !== "string") {
    throw new Error("Path must be a non-empty string")
  }
  await mkdir(dir, { recursive: true })
}

/**
 * Writes a file so readers see either the old content or the complete new content:
 * the data goes to a temp file beside the target, then is renamed over it.
 * @param filePath - Destination path.
 * @param content - Full file content.
 */
export async function writeFileAtomic(filePath: string, content: string) {
  if (!filePath || typeof filePath !== "string") {
    throw new Error("Path must be a non-empty string")
  }
  await ensureDir(path.dirname(filePath))
  const tmpPath = `${filePath}.${process.pid}.${Date.now()}.tmp`
  try {
    await writeFile(tmpPath, content, "utf8")
    await rename(tmpPath, filePath)
  } catch (err) {
    await rm(tmpPath, { force: true })
    throw err
  }
}

/**
 * Writes an array of objects to a JSONL file.
 * @param filePath - The file path to write to.
 * @param rows - Array of objects to serialize.
 */
export async function writeJsonl(filePath: string, rows: unknown[]) {
  if (!Array.isArray(rows)) {
    throw new Error("Rows must be an array")
  }
  const content = rows.map((r) => JSON.stringify(r)).join("\n") + (rows.length ? "\n" : "")
  await writeFileAtomic(filePath, content)
}

function csvCell(value: unknown): string {
  if (value === null || value === undefined) return ""
  const s = String(value)
  return /[",\r\n]/.test(s) ? `"${s.replace(/"/g, '""')}"` : s
}

/**
 * Serializes rows as CSV with a header line. Columns are written in the given order.
 * @param columns - Column names, also the keys read from each row.
 * @param rows - Rows to serialize.
 */
export function toCsv<T extends object, K extends keyof T & string>(columns: readonly K[], rows: readonly T[]): string {
  const lines = [columns.join(",")]
  for (const row of rows) {
    lines.push(columns.map((c) => csvCell(row[c])).join(","))
  }
  return lines.join("\n") + "\n"
}

/**
 * CSV columns of a rate table: the group keys, then the counts and the rate.
 */
export function rateColumns<const K extends GroupKey>(
  keys: readonly K[],
): ReadonlyArray<K | "total" | "false_positive_count" | "hallucination_rate"> {
  return [...keys, "total", "false_positive_count", "hallucination_rate"]
}

function rateTable<K extends GroupKey>(keys: readonly K[], rows: RateRow<K>[]): string {
  const header = `| ${keys.join(" | ")} | total | false positives | hallucination rate |`
  const align = `|${keys.map(() => "---").join("|")}|---:|---:|---:|`
  const body = rows.map(
    (r) =>
      `| ${keys.map((k) => r[k]).join(" | ")} | ${r.total} | ${r.false_positive_count} | ${pct(r.hallucination_rate)} |`,
  )
  return [header, align, ...body].join("\n")
}

/**
 * Pivots a rate table into a matrix: one row per `rowKey` value, one column per prompt.
 * Cells with no data stay empty.
 */
export function pivotRates<K extends "object" | "foldername">(
  rows: RateRow<"model" | "prompt" | K>[],
  rowKey: K,
  model: string,
): string {
  const forModel = rows.filter((r) => r.model === model)
  const prompts = [...new Set(forModel.map((r) => r.prompt))].sort()
  const labels = [...new Set(forModel.map((r) => r[rowKey]))].sort()
  const cells = new Map(forModel.map((r) => [JSON.stringify([r[rowKey], r.prompt]), r.hallucination_rate]))

  const lines = [`| ${rowKey} | ${prompts.join(" | ")} |`, `|---|${prompts.map(() => "---:").join("|")}|`]
  for (const label of labels) {
    const vals = prompts.map((p) => {
      const v = cells.get(JSON.stringify([label, p]))
      return v === undefined ? "" : v.toFixed(2)
    })
    lines.push(`| ${label} | ${vals.join(" | ")} |`)
  }
  return lines.join("\n")
}

/**
 * Renders a markdown report of the three rate tables and per-model pivot matrices.
 * @param meta - Metadata about the evaluation run.
 * @param tables - Rate tables from `aggregateAll`.
 */
export function renderMarkdownReport(meta: EvaluationReportMeta, tables: RateTables): string {
  const lines: string[] = []
  lines.push(`# Hallucination evaluation: ${meta.timestampIso}`)
  lines.push("")
  lines.push("## Inputs")
  lines.push("")
  lines.push(`- **results**: \`${meta.resultsDir}\``)
  lines.push(`- **files**: ${meta.files.map((f) => `\`${f}\``).join(", ")}`)
  lines.push(`- **records**: ${meta.records}`)
  lines.push(`- **duplicate tuples**: ${meta.duplicates}`)
  lines.push("")

  lines.push("## Overall")
  lines.push("")
  lines.push(rateTable(["model", "prompt"], tables.overall))
  lines.push("")

  const models = [...new Set(tables.overall.map((r) => r.model))]
  for (const model of models) {
    lines.push(`## Model: \`${model}\``)
    lines.push("")
    lines.push("### Object × prompt")
    lines.push("")
    lines.push(pivotRates(tables.object, "object", model))
    lines.push("")
    lines.push("### Folder × prompt")
    lines.push("")
    lines.push(pivotRates(tables.folder, "foldername", model))
    lines.push("")
  }

  lines.push("## Per object")
  lines.push("")
  lines.push(rateTable(["model", "prompt", "object"], tables.object))
  lines.push("")
  lines.push("## Per folder")
  lines.push("")
  lines.push(rateTable(["model", "prompt", "foldername"], tables.folder))
  lines.push("")

  return lines.join("\n")
}

export const CASE_COLUMNS = [
  "filename",
  "foldername",
  "object",
  "flag",
  "base_prompt",
  "variant_prompt",
  "base_answer",
  "variant_answer",
  "base_raw_answer",
  "variant_raw_answer",
] as const

export type CaseRow = Record<(typeof CASE_COLUMNS)[number], string | number | null>

export function caseRows(cases: TransitionCase[]): CaseRow[] {
  return cases.map((c) => ({
    filename: c.base.filename,
    foldername: c.base.foldername,
    object: c.base.object,
    flag: c.base.flag,
    base_prompt: c.base.prompt,
    variant_prompt: c.variant.prompt,
    base_answer: c.baseAnswer,
    variant_answer: c.variantAnswer,
    base_raw_answer: c.base.gpt_raw_answer,
    variant_raw_answer: c.variant.gpt_raw_answer,
  }))
}
