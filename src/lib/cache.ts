import { readFile } from "node:fs/promises"
import path from "node:path"
import { z } from "zod"
import { sha256Hex } from "./hash"
import { logger } from "./logger"
import { ensureDir, safeSlug, writeJsonl } from "./report"

const CacheEntrySchema = z.object({
  v: z.literal(1),
  model: z.string(),
  prompt: z.string(),
  tupleKey: z.string(),
  requestHash: z.string(),
  answer: z.string(),
  cachedAtIso: z.string(),
})

export type CacheEntry = z.infer<typeof CacheEntrySchema>

export type AnswerCache = Map<string, CacheEntry>

/**
 * Identifies a probe within one (model, prompt) run.
 * @param t - The tuple's location and object name.
 */
export function tupleKey(t: { foldername: string; filename: string; object: string }): string {
  return JSON.stringify([t.foldername, t.filename, t.object])
}

/**
 * Hash of everything sent for a tuple. A cached answer is reused only when the rendered
 * prompt, the token limit and the image bytes are unchanged.
 */
export async function computeRequestHash(params: {
  prompt: string
  tokenLimitParam: string
  maxTokens: number
  image: Uint8Array
}): Promise<string> {
  return sha256Hex(
    JSON.stringify({ prompt: params.prompt, param: params.tokenLimitParam, max: params.maxTokens }),
    params.image,
  )
}

/**
 * Gets the cache file path for a (model, prompt) pair.
 * Creates the directory if it doesn't exist.
 * @param params.cacheRoot - Root directory for caches.
 */
export async function getRunCachePath(params: { cacheRoot: string; model: string; prompt: string }) {
  if (!params.cacheRoot || !params.model || !params.prompt) {
    throw new Error("All cache path parameters must be provided")
  }
  const dir = path.join(params.cacheRoot, "answers", safeSlug(params.model))
  await ensureDir(dir)
  return path.join(dir, `${safeSlug(params.prompt)}.jsonl`)
}

/**
 * Loads cached answers from a JSONL file. A missing file is an empty cache.
 * @param cachePath - Path to the cache file.
 * @returns Map of tuple keys to cache entries.
 */
export async function loadAnswerCache(cachePath: string): Promise<AnswerCache> {
  const map: AnswerCache = new Map()
  let text: string
  try {
    text = await readFile(cachePath, "utf8")
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return map
    throw err
  }

  const lines = text.split(/\r?\n/)
  for (let i = 0; i < lines.length; i++) {
    const t = lines[i].trim()
    if (!t) continue
    let json: unknown
    try {
      json = JSON.parse(t)
    } catch (err) {
      logger.warn({ cachePath, line: i + 1, error: err }, "Skipping unreadable cache entry")
      continue
    }
    const parsed = CacheEntrySchema.safeParse(json)
    if (!parsed.success) {
      logger.warn({ cachePath, line: i + 1 }, "Skipping invalid cache entry")
      continue
    }
    map.set(parsed.data.tupleKey, parsed.data)
  }
  return map
}

/**
 * Saves the cache in JSONL format, one entry per line.
 */
export async function saveAnswerCache(cachePath: string, entries: AnswerCache) {
  await writeJsonl(cachePath, Array.from(entries.values()))
}

/**
 * Returns the cached answer for a tuple when the request is unchanged.
 */
export function lookupAnswer(cache: AnswerCache, key: string, requestHash: string): string | undefined {
  const hit = cache.get(key)
  return hit && hit.requestHash === requestHash ? hit.answer : undefined
}
