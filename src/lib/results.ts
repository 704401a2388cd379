import { readdir, readFile } from "node:fs/promises"
import path from "node:path"
import { InvalidResultFileError } from "./errors"
import { QueryRecordCollectionSchema, type QueryRecord } from "./records"
import { safeSlug, writeFileAtomic } from "./report"

export type ResultCollection = {
  filePath: string
  records: QueryRecord[]
}

/**
 * File name of the collection for one (model, prompt variant) pair.
 */
export function resultFileName(model: string, variant: string): string {
  return `${safeSlug(model)}_${safeSlug(variant)}_results.json`
}

/**
 * Persists the full collection in one atomic write.
 * @returns Path of the written file.
 */
export async function writeResultCollection(params: {
  outDir: string
  model: string
  variant: string
  records: QueryRecord[]
}): Promise<string> {
  const outPath = path.join(params.outDir, resultFileName(params.model, params.variant))
  await writeFileAtomic(outPath, JSON.stringify(params.records, null, 4) + "\n")
  return outPath
}

/**
 * Reads and validates one collection file.
 * @throws InvalidResultFileError when the file is not JSON or a record is malformed.
 */
export async function readResultCollection(filePath: string): Promise<ResultCollection> {
  const text = await readFile(filePath, "utf8")
  let data: unknown
  try {
    data = JSON.parse(text)
  } catch (err) {
    throw new InvalidResultFileError(filePath, "not valid JSON", err)
  }
  const parsed = QueryRecordCollectionSchema.safeParse(data)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const where = issue ? `${issue.path.join(".")}: ${issue.message}` : "schema mismatch"
    throw new InvalidResultFileError(filePath, where, parsed.error)
  }
  return { filePath, records: parsed.data }
}

/**
 * Loads every `*.json` collection in a results directory, sorted by file name.
 */
export async function loadResultCollections(resultsDir: string): Promise<ResultCollection[]> {
  let names: string[]
  try {
    names = await readdir(resultsDir)
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      throw new Error(`Results directory not found: ${resultsDir}`)
    }
    throw err
  }

  const files = names.filter((n) => n.endsWith(".json")).sort()
  const collections: ResultCollection[] = []
  for (const name of files) {
    collections.push(await readResultCollection(path.join(resultsDir, name)))
  }
  return collections
}

export function flattenCollections(collections: ResultCollection[]): QueryRecord[] {
  return collections.flatMap((c) => c.records)
}
