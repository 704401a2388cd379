import { describe, expect, it } from "vitest"
import { GROUPINGS, type RateRow } from "./aggregate"
import type { QueryRecord } from "./records"
import { CASE_COLUMNS, caseRows, pct, pivotRates, rateColumns, renderMarkdownReport, safeSlug, toCsv } from "./report"

describe("pct", () => {
  it("formats a fraction with one decimal", () => {
    expect(pct(0.5)).toBe("50.0%")
    expect(pct(1 / 3)).toBe("33.3%")
    expect(pct(NaN)).toBe("0.0%")
  })
})

describe("safeSlug", () => {
  it("replaces runs of unsafe characters", () => {
    expect(safeSlug("openai/gpt-4o")).toBe("openai_gpt-4o")
    expect(safeSlug("a b//c.d")).toBe("a_b_c.d")
  })
})

describe("toCsv", () => {
  it("writes the header and quotes cells that need it", () => {
    const rows = [
      { name: "plain", note: "a,b" },
      { name: 'say "hi"', note: null },
    ]
    expect(toCsv(["name", "note"], rows)).toBe('name,note\nplain,"a,b"\n"say ""hi""",\n')
  })

  it("orders rate columns after the group keys", () => {
    const rows: RateRow<"model" | "prompt">[] = [
      { model: "openai/gpt-4o", prompt: "baseline", total: 4, false_positive_count: 1, hallucination_rate: 0.25 },
    ]
    expect(toCsv(rateColumns(GROUPINGS.overall.keys), rows)).toBe(
      "model,prompt,total,false_positive_count,hallucination_rate\nopenai/gpt-4o,baseline,4,1,0.25\n",
    )
  })

  it("lists the folder columns in order", () => {
    const rows: RateRow<"model" | "prompt" | "foldername">[] = [
      { model: "m", prompt: "baseline", foldername: "dog", total: 2, false_positive_count: 0, hallucination_rate: 0 },
    ]
    expect(rateColumns(GROUPINGS.folder.keys)).toEqual([
      "model",
      "prompt",
      "foldername",
      "total",
      "false_positive_count",
      "hallucination_rate",
    ])
    expect(toCsv(rateColumns(GROUPINGS.folder.keys), rows)).toBe(
      "model,prompt,foldername,total,false_positive_count,hallucination_rate\nm,baseline,dog,2,0,0\n",
    )
  })
})

describe("pivotRates", () => {
  const rows: RateRow<"model" | "prompt" | "object">[] = [
    { model: "m", prompt: "baseline", object: "dog", total: 2, false_positive_count: 1, hallucination_rate: 0.5 },
    { model: "m", prompt: "mitigate1", object: "cat", total: 4, false_positive_count: 1, hallucination_rate: 0.25 },
    { model: "other", prompt: "baseline", object: "bird", total: 1, false_positive_count: 1, hallucination_rate: 1 },
  ]

  it("lays out labels by prompt for one model and leaves gaps empty", () => {
    expect(pivotRates(rows, "object", "m")).toBe(
      ["| object | baseline | mitigate1 |", "|---|---:|---:|", "| cat |  | 0.25 |", "| dog | 0.50 |  |"].join("\n"),
    )
  })
})

describe("renderMarkdownReport", () => {
  it("lists inputs and one section per model", () => {
    const md = renderMarkdownReport(
      { timestampIso: "2026-01-01T00:00:00.000Z", resultsDir: "results", files: ["a.json"], records: 3, duplicates: 0 },
      {
        overall: [{ model: "m", prompt: "baseline", total: 3, false_positive_count: 1, hallucination_rate: 1 / 3 }],
        object: [],
        folder: [],
      },
    )
    const lines = md.split("\n")
    expect(lines[0]).toBe("# Hallucination evaluation: 2026-01-01T00:00:00.000Z")
    expect(lines).toContain("- **files**: `a.json`")
    expect(lines).toContain("| m | baseline | 3 | 1 | 33.3% |")
    expect(lines).toContain("## Model: `m`")
  })
})

describe("caseRows", () => {
  it("flattens a transition into CSV columns", () => {
    const base: QueryRecord = {
      model: "m",
      prompt: "baseline",
      filename: "a.jpg",
      foldername: "person",
      object: "dog",
      flag: 0,
      gpt_raw_answer: "No.",
    }
    const variant: QueryRecord = { ...base, prompt: "misleading1", gpt_raw_answer: "Yes" }
    const rows = caseRows([{ base, variant, baseAnswer: "no", variantAnswer: "yes" }])

    expect(toCsv(CASE_COLUMNS, rows)).toBe(
      [
        CASE_COLUMNS.join(","),
        "a.jpg,person,dog,0,baseline,misleading1,no,yes,No.,Yes",
        "",
      ].join("\n"),
    )
  })
})
