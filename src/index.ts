#!/usr/bin/env -S npx tsx
import { loadEnv, requireApiKey } from "./config/env"
import path from "node:path"
import { getModelCapabilities } from "./config/models"
import { aggregateAll, findDuplicateRecords, GROUPINGS } from "./lib/aggregate"
import { buildProgram, type CasesArgs, type EvaluateArgs, type RunArgs } from "./lib/args"
import { findTransitions, selectRecords, type TransitionCase } from "./lib/cases"
import { createOpenRouterVisionClient } from "./lib/client"
import { formatError } from "./lib/errors"
import { loadGroundTruth } from "./lib/groundTruth"
import { createLogger, logger, setLogger } from "./lib/logger"
import {
  CASE_COLUMNS,
  caseRows,
  pct,
  rateColumns,
  renderMarkdownReport,
  toCsv,
  writeFileAtomic,
} from "./lib/report"
import { flattenCollections, loadResultCollections } from "./lib/results"
import { runPromptVariants, type RunProgressEvent } from "./lib/run"

function useLogFile(logFile: string | undefined) {
  if (logFile) setLogger(createLogger(logFile))
}

function onRunProgress(ev: RunProgressEvent) {
  if (ev.type === "runStart") {
    logger.info(
      { model: ev.model, prompt: ev.prompt, tuples: ev.totalTuples, skippedImages: ev.skippedImages },
      "Run started",
    )
    return
  }
  if (ev.type === "tupleDone") {
    logger.debug(
      { completed: ev.completed, total: ev.totalTuples, cached: ev.cached, answer: ev.record.gpt_raw_answer },
      "Tuple done",
    )
    return
  }
  if (ev.type === "runDone") {
    logger.info({ model: ev.model, prompt: ev.prompt, records: ev.records }, "Run finished")
  }
}

async function runCommand(args: RunArgs) {
  useLogFile(args.logFile)
  const apiKey = requireApiKey(loadEnv())
  const model = getModelCapabilities(args.model, {
    tokenLimitParam: args.tokenLimitParam,
    maxTokens: args.maxTokens,
  })
  const entries = await loadGroundTruth(args.groundTruthPath)
  logger.info({ entries: entries.length, path: args.groundTruthPath }, "Loaded ground truth")

  const runs = await runPromptVariants({
    openClient: () => createOpenRouterVisionClient({ apiKey }),
    model,
    variants: args.prompts,
    entries,
    targetFolders: args.folders,
    imageRoot: args.imageRoot,
    outDir: args.outDir,
    maxAttempts: args.maxAttempts,
    concurrency: args.concurrency,
    cacheRoot: args.cacheRoot,
    onProgress: onRunProgress,
  })

  for (const run of runs) {
    console.log(`${run.variant}: ${run.records.length} records -> ${run.outPath}`)
  }
}

async function evaluateCommand(args: EvaluateArgs) {
  useLogFile(args.logFile)
  logger.info({ resultsDir: args.resultsDir }, "Loading JSON result files...")
  const collections = await loadResultCollections(args.resultsDir)
  const records = flattenCollections(collections)
  logger.info({ files: collections.length, records: records.length }, `Loaded ${records.length} rows.`)

  const duplicates = findDuplicateRecords(records)
  for (const d of duplicates) {
    logger.warn(d, "Duplicate record tuple; totals include every copy")
  }

  const tables = aggregateAll(records)
  const overallPath = path.join(args.outDir, "overall_metrics.csv")
  const objectPath = path.join(args.outDir, "object_level_metrics.csv")
  const folderPath = path.join(args.outDir, "folder_level_metrics.csv")
  const reportPath = path.join(args.outDir, "report.md")

  await writeFileAtomic(overallPath, toCsv(rateColumns(GROUPINGS.overall.keys), tables.overall))
  await writeFileAtomic(objectPath, toCsv(rateColumns(GROUPINGS.object.keys), tables.object))
  await writeFileAtomic(folderPath, toCsv(rateColumns(GROUPINGS.folder.keys), tables.folder))
  await writeFileAtomic(
    reportPath,
    renderMarkdownReport(
      {
        timestampIso: new Date().toISOString(),
        resultsDir: args.resultsDir,
        files: collections.map((c) => path.basename(c.filePath)),
        records: records.length,
        duplicates: duplicates.length,
      },
      tables,
    ),
  )
  logger.info({ outDir: args.outDir }, "CSV files saved.")

  for (const row of tables.overall) {
    console.log(
      `${row.model} ${row.prompt}: ${pct(row.hallucination_rate)} (${row.false_positive_count}/${row.total})`,
    )
  }
  console.log(`All evaluation outputs saved to: ${args.outDir}`)
}

function printCases(title: string, cases: TransitionCase[], limit: number) {
  console.log("")
  console.log("==============================")
  console.log(title)
  console.log("==============================")
  if (cases.length === 0) {
    console.log("No example found.")
    return
  }
  for (const c of cases.slice(0, limit)) {
    console.log(`${c.base.foldername}/${c.base.filename}  ${c.base.object}  ${c.baseAnswer} -> ${c.variantAnswer}`)
  }
}

async function casesCommand(args: CasesArgs) {
  useLogFile(args.logFile)
  const records = flattenCollections(await loadResultCollections(args.resultsDir))
  const base = selectRecords(records, args.model, args.base)
  const misleading = selectRecords(records, args.model, args.misleading)
  const mitigation = selectRecords(records, args.model, args.mitigation)
  logger.info(
    { model: args.model, base: base.length, misleading: misleading.length, mitigation: mitigation.length },
    "Loaded records for case search",
  )

  const caseA = findTransitions(base, misleading).toHallucination
  const caseB = findTransitions(base, mitigation).toCorrected

  printCases(`CASE A: ${args.base} correct, ${args.misleading} hallucinated`, caseA, args.limit)
  printCases(`CASE B: ${args.base} hallucinated, ${args.mitigation} fixed it`, caseB, args.limit)

  await writeFileAtomic(path.join(args.outDir, "typical_caseA_misleading.csv"), toCsv(CASE_COLUMNS, caseRows(caseA)))
  await writeFileAtomic(path.join(args.outDir, "typical_caseB_mitigation.csv"), toCsv(CASE_COLUMNS, caseRows(caseB)))
  console.log("\nSaved typical cases to CSV.")
}

const program = buildProgram({
  run: runCommand,
  evaluate: evaluateCommand,
  cases: casesCommand,
})

program.parseAsync(process.argv).catch((err: unknown) => {
  logger.error({ error: err }, formatError(err))
  console.error(`ERROR: ${err instanceof Error ? err.message : String(err)}`)
  process.exitCode = 1
})
