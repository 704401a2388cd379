import { ABSENT_FLAG, type QueryRecord } from "./records"

export const NORMALIZED_ANSWERS = ["yes", "no", "unknown"] as const
export type NormalizedAnswer = (typeof NORMALIZED_ANSWERS)[number]

/**
 * Checks if a given value is a normalized answer.
 * @param x - The value to check.
 */
export function isNormalizedAnswer(x: unknown): x is NormalizedAnswer {
  return x === "yes" || x === "no" || x === "unknown"
}

/**
 * Maps a free-text model response to yes/no/unknown.
 *
 * This is a prefix classifier, not a word match: only the first character after trimming
 * and lower-casing counts. "Yes, partially visible" is "yes", "Nope" is "no", and a reply
 * starting with punctuation or a digit is "unknown". Non-string input is "unknown".
 * @param raw - The raw answer, as persisted.
 */
export function normalizeAnswer(raw: unknown): NormalizedAnswer {
  if (typeof raw !== "string") return "unknown"
  const t = raw.trim().toLowerCase()
  if (t.startsWith("y")) return "yes"
  if (t.startsWith("n")) return "no"
  return "unknown"
}

/**
 * A record is a false positive (a hallucination) when the object was declared absent
 * and the model still answered yes.
 */
export function isFalsePositive(record: Pick<QueryRecord, "flag" | "gpt_raw_answer">): boolean {
  return record.flag === ABSENT_FLAG && normalizeAnswer(record.gpt_raw_answer) === "yes"
}
