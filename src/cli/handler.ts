import { Effect, pipe } from "effect"
import { Console } from "effect"

import type { TuneOptions, ProbeOptions } from "./options"
import { parseOptions } from "./optionParsing"
import { fromDomainError } from "./errors"

import { tuneParameters, probeWorkspace, AppLive } from "@core"
import { parameterFlags } from "@domain/CompressionParameters"

/**
 * Print failures as an AppError and exit non-zero. Nothing is retried and no
 * partial result is reported.
 */
export const withErrorHandling = <A, R>(
  effect: Effect.Effect<A, unknown, R>
): Effect.Effect<void, never, R> =>
  pipe(
    effect,
    Effect.asVoid,
    Effect.catchAll((error) => {
      const appError = fromDomainError(error)
      return pipe(
        Console.error(`\n${appError.format()}`),
        Effect.zipRight(
          Effect.sync(() => {
            process.exitCode = 1
          })
        )
      )
    })
  )

/**
 * Run the tune command
 */
export const runTune = (options: TuneOptions) =>
  Effect.gen(function* () {
    if (options.debug) {
      yield* Effect.logInfo("Debug logging enabled")
    }

    const parsed = yield* parseOptions({
      root: options.root,
      exclude: options.exclude,
      maxThreads: options.maxThreads,
    })

    const result = yield* tuneParameters({
      root: parsed.root,
      binary: options.binary,
      exclude: parsed.exclude,
      maxThreads: parsed.maxThreads,
    })

    yield* Console.log(`✓ Archives written to ${parsed.root}`)
    yield* Console.log(`\nEquivalent 7z flags:`)
    yield* Console.log(`  -mx9 ${parameterFlags(result.parameters).join(" ")}\n`)

    return result
  })

/**
 * Run the probe command
 */
export const runProbe = (options: ProbeOptions) =>
  Effect.gen(function* () {
    const parsed = yield* parseOptions({
      root: options.root,
      exclude: options.exclude,
      maxThreads: options.maxThreads,
    })

    const result = yield* probeWorkspace(parsed)

    const runs =
      (result.candidates.dictionarySize.length +
        result.candidates.wordSize.length +
        result.candidates.blockSize.length +
        result.candidates.threads.length +
        1) *
      result.directories.length

    yield* Console.log(`\n   A full tune would run the compressor ${runs} times.\n`)

    return result
  })

/**
 * Export the application layer for CLI
 */
export { AppLive }
