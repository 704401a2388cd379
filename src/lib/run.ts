import type { ModelCapabilities } from "../config/models"
import { renderPrompt, type PromptVariant } from "../config/prompts"
import {
  computeRequestHash,
  getRunCachePath,
  loadAnswerCache,
  lookupAnswer,
  saveAnswerCache,
  tupleKey,
  type AnswerCache,
} from "./cache"
import { withVisionClient, type VisionClientHandle } from "./client"
import { createDispatcher, type Dispatcher } from "./dispatch"
import { imageExists, readImage, resolveImagePath } from "./images"
import { logger } from "./logger"
import { ABSENT_FLAG, type GroundTruthEntry, type QueryRecord } from "./records"
import { writeResultCollection } from "./results"

export type RunTask = {
  index: number
  foldername: string
  filename: string
  object: string
  imagePath: string
}

export type SkippedImage = {
  imagePath: string
  objects: number
}

export type RunPlan = {
  tasks: RunTask[]
  skipped: SkippedImage[]
}

export type RunParams = {
  dispatcher: Dispatcher
  model: ModelCapabilities
  variant: PromptVariant
  entries: readonly GroundTruthEntry[]
  targetFolders: readonly string[]
  imageRoot: string
  /** Dispatches in flight at once. Defaults to 1 (strictly sequential). */
  concurrency?: number
  cache?: AnswerCache
  onProgress?: (ev: RunProgressEvent) => void
}

export type RunProgressEvent =
  | {
      type: "runStart"
      model: string
      prompt: PromptVariant
      totalTuples: number
      skippedImages: number
    }
  | {
      type: "tupleSkipped"
      imagePath: string
      objects: number
    }
  | {
      type: "tupleDone"
      index: number
      completed: number
      totalTuples: number
      record: QueryRecord
      cached: boolean
    }
  | {
      type: "runDone"
      model: string
      prompt: PromptVariant
      records: number
    }

/**
 * Expands ground truth into the ordered list of probes: ground-truth file order outer,
 * absent-object order inner. Entries outside `targetFolders` are ignored; entries whose
 * image is missing are skipped with a warning.
 */
export async function planRun(params: {
  entries: readonly GroundTruthEntry[]
  targetFolders: readonly string[]
  imageRoot: string
}): Promise<RunPlan> {
  const folders = new Set(params.targetFolders)
  const tasks: RunTask[] = []
  const skipped: SkippedImage[] = []

  for (const entry of params.entries) {
    if (!folders.has(entry.foldername)) continue
    const imagePath = resolveImagePath(params.imageRoot, entry.foldername, entry.filename)
    if (!(await imageExists(imagePath))) {
      logger.warn({ imagePath, objects: entry.absentObjects.length }, `Missing image: ${imagePath}`)
      skipped.push({ imagePath, objects: entry.absentObjects.length })
      continue
    }
    for (const object of entry.absentObjects) {
      tasks.push({
        index: tasks.length,
        foldername: entry.foldername,
        filename: entry.filename,
        object,
        imagePath,
      })
    }
  }

  return { tasks, skipped }
}

/**
 * Executes tasks with a concurrency limit. Results keep task order. After the first
 * failure no new task starts; in-flight tasks are awaited, then that failure is thrown.
 * @param concurrency - Maximum number of concurrent tasks.
 * @param tasks - Array of task functions to execute.
 * @param onItem - Callback invoked when each task completes.
 */
export async function promisePool<T>(
  concurrency: number,
  tasks: Array<() => Promise<T>>,
  onItem: (value: T, index: number) => void,
): Promise<T[]> {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new Error("Concurrency must be at least 1")
  }

  const results: T[] = new Array(tasks.length)
  let next = 0
  let failed = false

  async function worker() {
    while (!failed) {
      const i = next++
      if (i >= tasks.length) return
      try {
        const v = await tasks[i]()
        results[i] = v
        onItem(v, i)
      } catch (err) {
        failed = true
        throw err
      }
    }
  }

  const c = Math.max(1, Math.min(concurrency, tasks.length))
  const settled = await Promise.allSettled(Array.from({ length: c }, () => worker()))
  const failure = settled.find((s): s is PromiseRejectedResult => s.status === "rejected")
  if (failure) throw failure.reason
  return results
}

/**
 * Queries every planned (image, object) pair for one model and prompt variant.
 * Any dispatch failure aborts the whole run; no records are returned in that case.
 * @returns Records in plan order, `flag` 0 for every record.
 */
export async function runPromptVariant(params: RunParams): Promise<QueryRecord[]> {
  const { model, variant } = params
  const plan = await planRun(params)
  for (const s of plan.skipped) {
    params.onProgress?.({ type: "tupleSkipped", imagePath: s.imagePath, objects: s.objects })
  }
  params.onProgress?.({
    type: "runStart",
    model: model.id,
    prompt: variant,
    totalTuples: plan.tasks.length,
    skippedImages: plan.skipped.length,
  })

  let completed = 0
  const jobs = plan.tasks.map((task) => async () => {
    logger.info(
      { model: model.id, prompt: variant, image: task.filename, object: task.object },
      `Model=${model.id} Prompt=${variant} Image=${task.filename} Object=${task.object}`,
    )
    const image = await readImage(task.imagePath)
    const key = tupleKey(task)

    let answer: string | undefined
    let requestHash: string | undefined
    if (params.cache) {
      requestHash = await computeRequestHash({
        prompt: renderPrompt(variant, task.object),
        tokenLimitParam: model.tokenLimitParam,
        maxTokens: model.defaultMaxTokens,
        image: image.bytes,
      })
      answer = lookupAnswer(params.cache, key, requestHash)
    }

    const cached = answer !== undefined
    if (answer === undefined) {
      answer = await params.dispatcher.dispatch({ image, objectName: task.object, variant, model })
      if (params.cache && requestHash) {
        params.cache.set(key, {
          v: 1,
          model: model.id,
          prompt: variant,
          tupleKey: key,
          requestHash,
          answer,
          cachedAtIso: new Date().toISOString(),
        })
      }
    }

    const record: QueryRecord = {
      model: model.id,
      prompt: variant,
      filename: task.filename,
      foldername: task.foldername,
      object: task.object,
      flag: ABSENT_FLAG,
      gpt_raw_answer: answer,
    }
    return { record, cached }
  })

  const results = await promisePool(params.concurrency ?? 1, jobs, (result, index) => {
    completed++
    params.onProgress?.({
      type: "tupleDone",
      index,
      completed,
      totalTuples: plan.tasks.length,
      record: result.record,
      cached: result.cached,
    })
  })

  const records = results.map((r) => r.record)
  params.onProgress?.({ type: "runDone", model: model.id, prompt: variant, records: records.length })
  return records
}

export type PersistedRun = {
  variant: PromptVariant
  outPath: string
  records: QueryRecord[]
}

// Save failures are logged and dropped; the run's own outcome stands.
async function saveCacheQuietly(cachePath: string, cache: AnswerCache) {
  try {
    await saveAnswerCache(cachePath, cache)
  } catch (err) {
    logger.error({ cachePath, error: err }, "Failed to save answer cache")
  }
}

/**
 * Runs one variant and persists its collection atomically. The answer cache (when
 * `cacheRoot` is set) is saved even if the run fails; the collection is written only on
 * success.
 */
export async function runAndPersist(
  params: Omit<RunParams, "cache"> & { outDir: string; cacheRoot?: string },
): Promise<PersistedRun> {
  const cachePath = params.cacheRoot
    ? await getRunCachePath({ cacheRoot: params.cacheRoot, model: params.model.id, prompt: params.variant })
    : undefined
  const cache = cachePath ? await loadAnswerCache(cachePath) : undefined

  let records: QueryRecord[]
  try {
    records = await runPromptVariant({ ...params, cache })
  } finally {
    if (cachePath && cache) await saveCacheQuietly(cachePath, cache)
  }

  const outPath = await writeResultCollection({
    outDir: params.outDir,
    model: params.model.id,
    variant: params.variant,
    records,
  })
  logger.info({ outPath, records: records.length }, `Saved file: ${outPath}`)
  return { variant: params.variant, outPath, records }
}

export type RunAllParams = Omit<RunParams, "dispatcher" | "variant" | "cache"> & {
  variants: readonly PromptVariant[]
  openClient: () => VisionClientHandle
  maxAttempts?: number
  outDir: string
  cacheRoot?: string
}

/**
 * Runs each selected prompt variant in order. Each run gets its own client handle,
 * released when the run ends. The first failed run aborts the remaining ones.
 */
export async function runPromptVariants(params: RunAllParams): Promise<PersistedRun[]> {
  if (params.variants.length === 0) {
    throw new Error("At least one prompt variant must be specified")
  }
  const start = performance.now()
  const runs: PersistedRun[] = []

  for (const variant of params.variants) {
    const run = await withVisionClient(params.openClient, (client) =>
      runAndPersist({
        ...params,
        variant,
        dispatcher: createDispatcher({ client, maxAttempts: params.maxAttempts }),
      }),
    )
    runs.push(run)
  }

  const elapsedSeconds = Math.round((performance.now() - start) / 10) / 100
  logger.info({ elapsedSeconds }, `Total runtime: ${elapsedSeconds} seconds`)
  return runs
}
