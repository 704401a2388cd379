import { normalizeAnswer, type NormalizedAnswer } from "./answers"
import { ABSENT_FLAG, type QueryRecord } from "./records"

export type TransitionCase = {
  base: QueryRecord
  variant: QueryRecord
  baseAnswer: NormalizedAnswer
  variantAnswer: NormalizedAnswer
}

export type Transitions = {
  /** Correct under the base prompt, hallucinated under the variant. */
  toHallucination: TransitionCase[]
  /** Hallucinated under the base prompt, corrected under the variant. */
  toCorrected: TransitionCase[]
}

function joinKey(r: QueryRecord): string {
  return JSON.stringify([r.filename, r.object, r.foldername, r.flag])
}

/**
 * Inner join of two record sets on (filename, object, foldername, flag).
 * Pairs come out in base order, then variant order. Records without a partner are
 * dropped. Duplicate keys fan out (every base × every variant match); deduplicate
 * upstream if that is not wanted.
 */
export function joinRecords(
  base: readonly QueryRecord[],
  variant: readonly QueryRecord[],
): Array<[QueryRecord, QueryRecord]> {
  const byKey = new Map<string, QueryRecord[]>()
  for (const r of variant) {
    const k = joinKey(r)
    const list = byKey.get(k)
    if (list) list.push(r)
    else byKey.set(k, [r])
  }

  const pairs: Array<[QueryRecord, QueryRecord]> = []
  for (const b of base) {
    for (const v of byKey.get(joinKey(b)) ?? []) pairs.push([b, v])
  }
  return pairs
}

/**
 * Finds probes whose answer flipped between two prompt variants.
 * @param base - Records of the reference prompt (usually `baseline`).
 * @param variant - Records of the prompt being compared.
 */
export function findTransitions(base: readonly QueryRecord[], variant: readonly QueryRecord[]): Transitions {
  const toHallucination: TransitionCase[] = []
  const toCorrected: TransitionCase[] = []

  for (const [b, v] of joinRecords(base, variant)) {
    if (b.flag !== ABSENT_FLAG) continue
    const baseAnswer = normalizeAnswer(b.gpt_raw_answer)
    const variantAnswer = normalizeAnswer(v.gpt_raw_answer)
    const c = { base: b, variant: v, baseAnswer, variantAnswer }
    if (baseAnswer === "no" && variantAnswer === "yes") toHallucination.push(c)
    else if (baseAnswer === "yes" && variantAnswer === "no") toCorrected.push(c)
  }

  return { toHallucination, toCorrected }
}

/**
 * Records of one model and prompt, in collection order.
 */
export function selectRecords(records: readonly QueryRecord[], model: string, prompt: string): QueryRecord[] {
  return records.filter((r) => r.model === model && r.prompt === prompt)
}
