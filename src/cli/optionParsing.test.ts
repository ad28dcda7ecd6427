import { describe, expect, test } from "vitest"
import { Effect } from "effect"
import { parseOptions, splitCommaSeparated } from "./optionParsing"

describe("splitCommaSeparated", () => {
  test("trims entries and drops empty ones", () => {
    expect(splitCommaSeparated(" a, b ,,c ")).toEqual(["a", "b", "c"])
  })

  test("undefined is no entries", () => {
    expect(splitCommaSeparated(undefined)).toEqual([])
  })
})

describe("parseOptions", () => {
  test("falls back to the default thread count", () => {
    const parsed = Effect.runSync(parseOptions({ root: " /work " }, 8))

    expect(parsed).toEqual({ root: "/work", exclude: [], maxThreads: 8 })
  })

  test("explicit thread count and excludes win", () => {
    const parsed = Effect.runSync(parseOptions({ root: "/work", exclude: "node_modules,dist", maxThreads: 2 }, 8))

    expect(parsed).toEqual({ root: "/work", exclude: ["node_modules", "dist"], maxThreads: 2 })
  })

  test("empty root is rejected", () => {
    const error = Effect.runSync(Effect.flip(parseOptions({ root: "  " }, 8)))

    expect(error.option).toBe("root")
    expect(error.reason).toBe("must not be empty")
  })

  test("thread count below one is rejected", () => {
    const error = Effect.runSync(Effect.flip(parseOptions({ root: "/work", maxThreads: 0 }, 8)))

    expect(error.option).toBe("max-threads")
    expect(error.reason).toBe("must be a whole number of at least 1, got 0")
    expect(error.message).toBe("--max-threads: must be a whole number of at least 1, got 0")
  })
})
