import { readFile } from "node:fs/promises"
import { MalformedGroundTruthError } from "./errors"
import type { GroundTruthEntry } from "./records"

const REQUIRED_COLUMNS = ["foldername", "filename", "no"] as const

export type CsvRecord = {
  /** 1-based line on which the record starts. */
  line: number
  fields: string[]
}

/**
 * Splits CSV text into records. Quoted fields may hold delimiters, doubled quotes and line
 * breaks. Cells are returned as written, without trimming. Blank lines yield no record.
 * @throws MalformedGroundTruthError on an unterminated quoted field.
 */
export function parseCsv(text: string, delimiter = ","): CsvRecord[] {
  const records: CsvRecord[] = []
  let fields: string[] = []
  let current = ""
  let inQuotes = false
  let line = 1
  let recordLine = 1

  const endRecord = () => {
    fields.push(current)
    if (fields.length > 1 || fields[0] !== "") {
      records.push({ line: recordLine, fields })
    }
    fields = []
    current = ""
  }

  for (let i = 0; i < text.length; i++) {
    const char = text[i]

    if (inQuotes) {
      if (char === '"' && text[i + 1] === '"') {
        current += '"'
        i++
      } else if (char === '"') {
        inQuotes = false
      } else {
        if (char === "\n") line++
        current += char
      }
      continue
    }

    if (char === '"' && current === "") {
      inQuotes = true
    } else if (char === delimiter) {
      fields.push(current)
      current = ""
    } else if (char === "\r" && text[i + 1] === "\n") {
      continue
    } else if (char === "\n") {
      endRecord()
      line++
      recordLine = line
    } else {
      current += char
    }
  }

  if (inQuotes) {
    throw new MalformedGroundTruthError("unterminated quoted field", recordLine)
  }
  if (current !== "" || fields.length > 0) endRecord()
  return records
}

/**
 * Parses a list literal of quoted strings such as `['dog', "traffic light"]`.
 *
 * Only strings are accepted: single or double quotes, backslash escapes the next
 * character, an optional trailing comma. The text is never evaluated.
 * @param text - The raw `no` column.
 * @throws Error describing the first problem found.
 */
export function parseObjectList(text: string): string[] {
  const s = text.trim()
  if (!s.startsWith("[") || !s.endsWith("]") || s.length < 2) {
    throw new Error("expected a bracketed list")
  }

  const items: string[] = []
  const end = s.length - 1
  let i = 1
  const skipWhitespace = () => {
    while (i < end && /\s/.test(s[i])) i++
  }

  skipWhitespace()
  while (i < end) {
    const quote = s[i]
    if (quote !== "'" && quote !== '"') {
      throw new Error(`expected a quoted string at position ${i}`)
    }
    i++

    let value = ""
    let closed = false
    while (i < end) {
      const ch = s[i]
      if (ch === "\\") {
        if (i + 1 >= end) break
        value += s[i + 1]
        i += 2
        continue
      }
      if (ch === quote) {
        closed = true
        i++
        break
      }
      value += ch
      i++
    }
    if (!closed) throw new Error("unterminated string")
    if (!value.trim()) throw new Error("empty object name")
    items.push(value)

    skipWhitespace()
    if (i < end) {
      if (s[i] !== ",") throw new Error(`expected "," at position ${i}`)
      i++
      skipWhitespace()
    }
  }

  return items
}

/**
 * Parses ground-truth CSV text with the columns `foldername, filename, no`.
 * Any malformed row aborts parsing; rows are returned in file order.
 * @param text - CSV content.
 * @throws MalformedGroundTruthError naming the offending line.
 */
export function parseGroundTruth(text: string): GroundTruthEntry[] {
  const [header, ...rows] = parseCsv(text.replace(/^\uFEFF/, ""))
  if (!header) {
    throw new MalformedGroundTruthError("Ground truth file is empty", 1)
  }

  const columns: Record<(typeof REQUIRED_COLUMNS)[number], number> = {
    foldername: header.fields.indexOf("foldername"),
    filename: header.fields.indexOf("filename"),
    no: header.fields.indexOf("no"),
  }
  const missing = REQUIRED_COLUMNS.filter((c) => columns[c] === -1)
  if (missing.length > 0) {
    throw new MalformedGroundTruthError(`Missing column(s): ${missing.join(", ")}`, header.line)
  }

  const entries: GroundTruthEntry[] = []
  for (const { line: lineNo, fields } of rows) {
    const foldername = fields[columns.foldername] ?? ""
    const filename = fields[columns.filename] ?? ""
    const rawList = fields[columns.no]
    if (!foldername || !filename || rawList === undefined) {
      throw new MalformedGroundTruthError("Row is missing foldername, filename or no", lineNo)
    }

    let absentObjects: string[]
    try {
      absentObjects = parseObjectList(rawList)
    } catch (err) {
      throw new MalformedGroundTruthError(
        `Cannot parse "no" list for ${foldername}/${filename}: ${err instanceof Error ? err.message : String(err)}`,
        lineNo,
      )
    }
    entries.push({ foldername, filename, absentObjects })
  }

  return entries
}

/**
 * Loads and validates ground-truth entries from a CSV file.
 * @param filePath - Path to the ground-truth CSV.
 */
export async function loadGroundTruth(filePath: string): Promise<GroundTruthEntry[]> {
  if (!filePath || typeof filePath !== "string") {
    throw new Error("File path must be a non-empty string")
  }
  let text: string
  try {
    text = await readFile(filePath, "utf8")
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      throw new Error(`Ground truth file not found: ${filePath}`)
    }
    throw err
  }
  return parseGroundTruth(text)
}
