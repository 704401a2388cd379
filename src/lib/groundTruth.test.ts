import { mkdtemp, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import path from "node:path"
import { afterEach, beforeEach, describe, expect, it } from "vitest"
import { MalformedGroundTruthError } from "./errors"
import { loadGroundTruth, parseCsv, parseGroundTruth, parseObjectList } from "./groundTruth"

describe("parseCsv", () => {
  it("splits quoted fields containing commas and doubled quotes", () => {
    expect(parseCsv(`dog,0001.jpg,"['cat', 'car']"`)).toEqual([{ line: 1, fields: ["dog", "0001.jpg", "['cat', 'car']"] }])
    expect(parseCsv(`a,"say ""hi""",c`)).toEqual([{ line: 1, fields: ["a", 'say "hi"', "c"] }])
  })

  it("keeps line breaks inside quotes and reports where each record starts", () => {
    expect(parseCsv(`h1,h2\nx,"a\nb"\n\ny,z\n`)).toEqual([
      { line: 1, fields: ["h1", "h2"] },
      { line: 2, fields: ["x", "a\nb"] },
      { line: 5, fields: ["y", "z"] },
    ])
  })

  it("returns cells untrimmed", () => {
    expect(parseCsv(` dog ,a.jpg`)).toEqual([{ line: 1, fields: [" dog ", "a.jpg"] }])
  })

  it("rejects an unterminated quote", () => {
    expect(() => parseCsv(`a,"b`)).toThrow("unterminated quoted field")
  })
})

describe("parseObjectList", () => {
  it("parses single- and double-quoted strings", () => {
    expect(parseObjectList(`['cat', "traffic light"]`)).toEqual(["cat", "traffic light"])
    expect(parseObjectList(`  [ 'a' ,'b', ]  `)).toEqual(["a", "b"])
    expect(parseObjectList(`[]`)).toEqual([])
  })

  it("keeps escaped quotes and preserves case and inner spacing", () => {
    expect(parseObjectList(`['children\\'s book', 'Dog ']`)).toEqual(["children's book", "Dog "])
  })

  it("rejects anything that is not a list of strings", () => {
    expect(() => parseObjectList(`cat, car`)).toThrow("expected a bracketed list")
    expect(() => parseObjectList(`[cat]`)).toThrow("expected a quoted string")
    expect(() => parseObjectList(`[1, 2]`)).toThrow("expected a quoted string")
    expect(() => parseObjectList(`['a' 'b']`)).toThrow('expected ","')
    expect(() => parseObjectList(`['a]`)).toThrow("unterminated string")
    expect(() => parseObjectList(`['']`)).toThrow("empty object name")
    expect(() => parseObjectList(`[__import__('os')]`)).toThrow("expected a quoted string")
  })
})

describe("parseGroundTruth", () => {
  it("returns entries in file order", () => {
    const text = [
      "foldername,filename,no",
      `dog,d1.jpg,"['cat', 'car']"`,
      "",
      `cat,c1.jpg,"['dog']"`,
    ].join("\r\n")

    expect(parseGroundTruth(text)).toEqual([
      { foldername: "dog", filename: "d1.jpg", absentObjects: ["cat", "car"] },
      { foldername: "cat", filename: "c1.jpg", absentObjects: ["dog"] },
    ])
  })

  it("finds columns by header name", () => {
    const text = [`no,extra,filename,foldername`, `"['chair']",x,p1.jpg,person`].join("\n")
    expect(parseGroundTruth(text)).toEqual([{ foldername: "person", filename: "p1.jpg", absentObjects: ["chair"] }])
  })

  it("reads a list spanning lines and keeps names as written", () => {
    const text = ["foldername,filename,no", ` dog ,d1.jpg,"['cat',`, ` 'car']"`, `dog,d2.jpg,"[cat]"`].join("\n")
    let caught: unknown
    try {
      parseGroundTruth(text)
    } catch (err) {
      caught = err
    }
    expect(caught).toBeInstanceOf(MalformedGroundTruthError)
    if (caught instanceof MalformedGroundTruthError) expect(caught.line).toBe(4)

    expect(parseGroundTruth(text.split("\n").slice(0, 3).join("\n"))).toEqual([
      { foldername: " dog ", filename: "d1.jpg", absentObjects: ["cat", "car"] },
    ])
  })

  it("reports a missing column", () => {
    expect(() => parseGroundTruth("foldername,filename\ndog,d1.jpg")).toThrow("Missing column(s): no")
  })

  it("aborts on a malformed list and names the line", () => {
    const text = ["foldername,filename,no", `dog,d1.jpg,"['cat']"`, `dog,d2.jpg,"[cat]"`].join("\n")
    let caught: unknown
    try {
      parseGroundTruth(text)
    } catch (err) {
      caught = err
    }
    expect(caught).toBeInstanceOf(MalformedGroundTruthError)
    if (caught instanceof MalformedGroundTruthError) {
      expect(caught.line).toBe(3)
      expect(caught.message).toContain("dog/d2.jpg")
    }
  })
})

describe("loadGroundTruth", () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "gt-"))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it("reads a CSV file", async () => {
    const file = path.join(dir, "GroundTruth.csv")
    await writeFile(file, `\uFEFFfoldername,filename,no\ncar,k1.jpg,"['dog', 'bird']"\n`, "utf8")
    await expect(loadGroundTruth(file)).resolves.toEqual([
      { foldername: "car", filename: "k1.jpg", absentObjects: ["dog", "bird"] },
    ])
  })

  it("explains a missing file", async () => {
    await expect(loadGroundTruth(path.join(dir, "nope.csv"))).rejects.toThrow("Ground truth file not found")
  })
})
