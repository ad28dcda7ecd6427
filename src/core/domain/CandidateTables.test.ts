import { describe, expect, test } from "vitest"
import { Option } from "effect"
import {
  BLOCK_SIZES,
  DICTIONARY_SIZES,
  WORD_SIZES,
  megabytes,
  parseMagnitude,
} from "./CandidateTables"

describe("candidate tables", () => {
  test("word sizes ascend to the format maximum", () => {
    expect(WORD_SIZES).toHaveLength(12)
    expect(WORD_SIZES[0]).toBe(8)
    expect(WORD_SIZES[WORD_SIZES.length - 1]).toBe(273)
  })

  test("dictionary sizes run from 64k to 1536m", () => {
    expect(DICTIONARY_SIZES).toHaveLength(22)
    expect(DICTIONARY_SIZES[0]).toBe("64k")
    expect(DICTIONARY_SIZES[DICTIONARY_SIZES.length - 1]).toBe("1536m")
  })

  test("block sizes start with the two solid modes", () => {
    expect(BLOCK_SIZES.slice(0, 3)).toEqual(["=off", "=on", "1m"])
    expect(BLOCK_SIZES[BLOCK_SIZES.length - 1]).toBe("64g")
  })

  test("megabyte-suffixed entries ascend in every table", () => {
    const tables: ReadonlyArray<ReadonlyArray<string>> = [DICTIONARY_SIZES, BLOCK_SIZES]
    for (const table of tables) {
      const values = table.flatMap((value) => Option.toArray(megabytes(value)))
      expect(values).toEqual([...values].sort((a, b) => a - b))
    }
  })
})

describe("parseMagnitude", () => {
  test("splits amount and unit", () => {
    expect(Option.getOrUndefined(parseMagnitude("64k"))).toEqual({ amount: 64, unit: "k" })
    expect(Option.getOrUndefined(parseMagnitude("1536m"))).toEqual({ amount: 1536, unit: "m" })
    expect(Option.getOrUndefined(parseMagnitude("16g"))).toEqual({ amount: 16, unit: "g" })
  })

  test("sentinel modes have no magnitude", () => {
    expect(Option.isNone(parseMagnitude("=off"))).toBe(true)
    expect(Option.isNone(parseMagnitude("=on"))).toBe(true)
  })
})

describe("megabytes", () => {
  test("only megabyte-suffixed values are numeric", () => {
    expect(Option.getOrUndefined(megabytes("64m"))).toEqual(64)
    expect(Option.isNone(megabytes("64k"))).toBe(true)
    expect(Option.isNone(megabytes("1g"))).toBe(true)
    expect(Option.isNone(megabytes("=on"))).toBe(true)
  })
})
