import { describe, expect, test } from "vitest"
import { isCandidateDirectory, largestSizeMB } from "./Directory"

describe("isCandidateDirectory", () => {
  test("skips hidden directories and venv", () => {
    expect(isCandidateDirectory("photos", [])).toBe(true)
    expect(isCandidateDirectory(".git", [])).toBe(false)
    expect(isCandidateDirectory("venv", [])).toBe(false)
  })

  test("skips extra exclusions", () => {
    expect(isCandidateDirectory("node_modules", ["node_modules"])).toBe(false)
    expect(isCandidateDirectory("venv2", [])).toBe(true)
  })
})

describe("largestSizeMB", () => {
  test("returns the maximum", () => {
    expect(
      largestSizeMB([
        { name: "A", sizeMB: 10 },
        { name: "B", sizeMB: 5 },
      ])
    ).toBe(10)
  })
})
