import { z } from "zod"

export type GroundTruthEntry = {
  foldername: string
  filename: string
  /** Objects known to be absent from the image, in file order. */
  absentObjects: string[]
}

/**
 * Marks a probe as a declared-absent (true negative) check. Only value produced today;
 * the field stays explicit so true-positive probes can be added later.
 */
export const ABSENT_FLAG = 0

export const QueryRecordSchema = z.object({
  model: z.string(),
  prompt: z.string(),
  filename: z.string(),
  foldername: z.string(),
  object: z.string(),
  flag: z.number().int(),
  gpt_raw_answer: z.string().nullable(),
})

export type QueryRecord = z.infer<typeof QueryRecordSchema>

export const QueryRecordCollectionSchema = z.array(QueryRecordSchema)
