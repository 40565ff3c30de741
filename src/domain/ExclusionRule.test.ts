import { describe, expect, test } from "vitest"
import {
  compileExclusions,
  containsComponents,
  countComponents,
  isDirectoryExcluded,
  isFileExcluded,
} from "./ExclusionRule"

describe("countComponents", () => {
  test("counts repeated components", () => {
    expect(Array.from(countComponents("/a/b/a"))).toEqual([
      ["a", 2],
      ["b", 1],
    ])
  })
})

describe("containsComponents", () => {
  test("requires at least the same multiplicity", () => {
    expect(containsComponents(countComponents("/a/b/a"), countComponents("a/a"))).toBe(true)
    expect(containsComponents(countComponents("/a/b"), countComponents("a/a"))).toBe(false)
  })
})

describe("isDirectoryExcluded", () => {
  const exclusions = compileExclusions(["a/b"])

  test("excludes the named directory and its descendants", () => {
    expect(isDirectoryExcluded("/a/b", exclusions)).toBe(true)
    expect(isDirectoryExcluded("/a/b/c", exclusions)).toBe(true)
  })

  test("excludes paths holding the same components in another arrangement", () => {
    expect(isDirectoryExcluded("/a/c/b", exclusions)).toBe(true)
    expect(isDirectoryExcluded("/b/a", exclusions)).toBe(true)
  })

  test("keeps directories missing a component", () => {
    expect(isDirectoryExcluded("/a", exclusions)).toBe(false)
    expect(isDirectoryExcluded("/a/c", exclusions)).toBe(false)
    expect(isDirectoryExcluded("/ab/c", exclusions)).toBe(false)
  })

  test("ignores leading and trailing separators on both sides", () => {
    const withSeparators = compileExclusions(["/tmp/demo/bin/"])
    expect(isDirectoryExcluded("tmp/demo/bin", withSeparators)).toBe(true)
    expect(isDirectoryExcluded("/tmp/demo/bin/", withSeparators)).toBe(true)
  })

  test("matches when any rule matches", () => {
    const several = compileExclusions(["/var/cache", "/opt/app/logs"])
    expect(isDirectoryExcluded("/opt/app/logs", several)).toBe(true)
    expect(isDirectoryExcluded("/var/cache/x", several)).toBe(true)
    expect(isDirectoryExcluded("/opt/app", several)).toBe(false)
  })

  test("never matches with no rules", () => {
    expect(isDirectoryExcluded("/a/b", compileExclusions([]))).toBe(false)
  })

  test("drops blank and root-only rules instead of excluding everything", () => {
    const malformed = compileExclusions(["", "   ", "/"])
    expect(malformed.rules).toHaveLength(0)
    expect(isDirectoryExcluded("/a/b", malformed)).toBe(false)
  })
})

describe("isFileExcluded", () => {
  const exclusions = compileExclusions(["/tmp/demo/bin/run.sh"])

  test("excludes the exact path", () => {
    expect(isFileExcluded("/tmp/demo/bin/run.sh", "run.sh", exclusions, [])).toBe(true)
  })

  test("does not exclude differently-cased or differently-spaced paths", () => {
    expect(isFileExcluded("/tmp/demo/bin/Run.sh", "Run.sh", exclusions, [])).toBe(false)
    expect(isFileExcluded("/tmp/demo/bin/run .sh", "run .sh", exclusions, [])).toBe(false)
  })

  test("does not apply component matching to files", () => {
    const dirRule = compileExclusions(["demo/run.sh"])
    expect(isFileExcluded("/tmp/demo/run.sh", "run.sh", dirRule, [])).toBe(false)
  })

  test("excludes byproduct suffixes", () => {
    expect(isFileExcluded("/tmp/demo/tsconfig.tsbuildinfo", "tsconfig.tsbuildinfo", exclusions, [".tsbuildinfo"])).toBe(true)
    expect(isFileExcluded("/tmp/demo/notes.txt", "notes.txt", exclusions, [".tsbuildinfo"])).toBe(false)
  })
})
