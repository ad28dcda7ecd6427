import { describe, expect, test } from "vitest"
import { Option } from "effect"
import { smallest, type SweepTable } from "./SweepTable"

describe("smallest", () => {
  test("returns the entry with the minimum size", () => {
    const table: SweepTable<string> = [
      { candidate: "1m", totalBytes: 3_400_000 },
      { candidate: "4m", totalBytes: 3_145_728 },
      { candidate: "8m", totalBytes: 3_200_000 },
    ]

    expect(Option.getOrUndefined(smallest(table))).toEqual({ candidate: "4m", totalBytes: 3_145_728 })
  })

  test("first minimal entry wins ties", () => {
    const table: SweepTable<number> = [
      { candidate: 8, totalBytes: 500 },
      { candidate: 4, totalBytes: 100 },
      { candidate: 2, totalBytes: 100 },
      { candidate: 1, totalBytes: 100 },
    ]

    expect(Option.getOrUndefined(smallest(table))).toEqual({ candidate: 4, totalBytes: 100 })
  })

  test("a full tie picks the first candidate measured", () => {
    const table: SweepTable<number> = [16, 8, 4, 2, 1].map((candidate) => ({ candidate, totalBytes: 42 }))

    expect(Option.getOrUndefined(Option.map(smallest(table), (entry) => entry.candidate))).toEqual(16)
  })

  test("empty table has no winner", () => {
    expect(Option.isNone(smallest([]))).toBe(true)
  })
})
