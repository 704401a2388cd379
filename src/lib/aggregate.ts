import { isFalsePositive } from "./answers"
import type { QueryRecord } from "./records"

export type GroupKey = "model" | "prompt" | "object" | "foldername"

export type RateRow<K extends GroupKey> = { [P in K]: string } & {
  total: number
  false_positive_count: number
  hallucination_rate: number
}

export type Grouping<K extends GroupKey> = {
  keys: readonly K[]
  pick: (record: QueryRecord) => { [P in K]: string }
}

const overall: Grouping<"model" | "prompt"> = {
  keys: ["model", "prompt"],
  pick: (r) => ({ model: r.model, prompt: r.prompt }),
}

const object: Grouping<"model" | "prompt" | "object"> = {
  keys: ["model", "prompt", "object"],
  pick: (r) => ({ model: r.model, prompt: r.prompt, object: r.object }),
}

const folder: Grouping<"model" | "prompt" | "foldername"> = {
  keys: ["model", "prompt", "foldername"],
  pick: (r) => ({ model: r.model, prompt: r.prompt, foldername: r.foldername }),
}

/** The supported group-key tuples. */
export const GROUPINGS = { overall, object, folder }

function compareKeys(a: readonly string[], b: readonly string[]): number {
  for (let i = 0; i < a.length; i++) {
    if (a[i] < b[i]) return -1
    if (a[i] > b[i]) return 1
  }
  return 0
}

/**
 * Computes hallucination rates per group.
 *
 * Groups are keyed on the exact values of the grouping's columns (no trimming or case
 * folding); only the answer is normalized. Rows come back sorted by the key columns, so
 * equal input always produces an identical table. Only keys present in the data form
 * groups, so no row has a zero total. Answers normalized to "unknown" count toward
 * `total` but never as false positives.
 * @param records - Records from one or more collections.
 * @param grouping - One of `GROUPINGS`.
 */
export function aggregate<K extends GroupKey>(records: readonly QueryRecord[], grouping: Grouping<K>): RateRow<K>[] {
  const groups = new Map<string, { key: { [P in K]: string }; values: string[]; total: number; fp: number }>()
  for (const r of records) {
    const key = grouping.pick(r)
    const values = grouping.keys.map((k) => key[k])
    const id = JSON.stringify(values)
    let g = groups.get(id)
    if (!g) {
      g = { key, values, total: 0, fp: 0 }
      groups.set(id, g)
    }
    g.total++
    if (isFalsePositive(r)) g.fp++
  }

  return [...groups.values()]
    .sort((a, b) => compareKeys(a.values, b.values))
    .map((g) => ({
      ...g.key,
      total: g.total,
      false_positive_count: g.fp,
      hallucination_rate: g.fp / g.total,
    }))
}

export function aggregateAll(records: readonly QueryRecord[]) {
  return {
    overall: aggregate(records, GROUPINGS.overall),
    object: aggregate(records, GROUPINGS.object),
    folder: aggregate(records, GROUPINGS.folder),
  }
}

export type DuplicateTuple = {
  model: string
  prompt: string
  foldername: string
  filename: string
  object: string
  count: number
}

/**
 * Lists (model, prompt, foldername, filename, object) tuples that occur more than once.
 * Duplicates inflate `total`; they are reported here and never removed.
 */
export function findDuplicateRecords(records: readonly QueryRecord[]): DuplicateTuple[] {
  const counts = new Map<string, DuplicateTuple>()
  for (const r of records) {
    const id = JSON.stringify([r.model, r.prompt, r.foldername, r.filename, r.object])
    const hit = counts.get(id)
    if (hit) {
      hit.count++
    } else {
      counts.set(id, {
        model: r.model,
        prompt: r.prompt,
        foldername: r.foldername,
        filename: r.filename,
        object: r.object,
        count: 1,
      })
    }
  }
  return [...counts.values()].filter((d) => d.count > 1)
}
