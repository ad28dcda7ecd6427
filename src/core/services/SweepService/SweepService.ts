/**
 * SweepService - one parameter at a time, compress with every candidate and
 * record the archive total each one produced.
 *
 * Candidates run strictly one after another: each measurement owns the
 * compressor and its scratch directory until it finishes.
 */

import { Context, Data, Effect, Layer, Option, pipe } from "effect"
import { CompressorServiceTag, type CompressionTarget, type CompressorError } from "../CompressorService"
import { LoggerServiceTag } from "../LoggerService"
import {
  blockSizeCandidates,
  dictionarySizeCandidates,
  threadCandidates,
  wordSizeCandidates,
} from "@domain/Bounds"
import { smallest, type SweepEntry, type SweepParameter, type SweepTable } from "@domain/SweepTable"
import type { CompressionParameters } from "@domain/CompressionParameters"
import type { BlockSize, DictionarySize, WordSize } from "@domain/CandidateTables"

export class EmptySweep extends Data.TaggedError("EmptySweep")<{
  readonly parameter: SweepParameter
}> {}

export interface SweepService {
  readonly sweep: <K extends string | number>(
    parameter: SweepParameter,
    candidates: ReadonlyArray<K>,
    parametersFor: (candidate: K) => CompressionParameters,
    target: CompressionTarget
  ) => Effect.Effect<SweepTable<K>, CompressorError>
  readonly sweepDictionarySizes: (
    target: CompressionTarget,
    largestDirectoryMB: number
  ) => Effect.Effect<SweepTable<DictionarySize>, CompressorError>
  readonly sweepWordSizes: (
    target: CompressionTarget,
    fixed: { readonly dictionarySize: DictionarySize }
  ) => Effect.Effect<SweepTable<WordSize>, CompressorError>
  readonly sweepBlockSizes: (
    target: CompressionTarget,
    fixed: { readonly dictionarySize: DictionarySize; readonly wordSize: WordSize },
    largestDirectoryMB: number
  ) => Effect.Effect<SweepTable<BlockSize>, CompressorError>
  readonly sweepThreadCounts: (
    target: CompressionTarget,
    fixed: {
      readonly dictionarySize: DictionarySize
      readonly wordSize: WordSize
      readonly blockSize: BlockSize
    },
    maxThreads: number
  ) => Effect.Effect<SweepTable<number>, CompressorError>
  /** First minimal entry; an empty table is an error, never a default. */
  readonly best: <K>(
    parameter: SweepParameter,
    table: SweepTable<K>
  ) => Effect.Effect<SweepEntry<K>, EmptySweep>
}

export class SweepServiceTag extends Context.Tag("SweepService")<SweepServiceTag, SweepService>() {}

export const SweepServiceLive = Layer.effect(
  SweepServiceTag,
  Effect.gen(function* () {
    const compressor = yield* CompressorServiceTag
    const logger = yield* LoggerServiceTag

    const sweep = <K extends string | number>(
      parameter: SweepParameter,
      candidates: ReadonlyArray<K>,
      parametersFor: (candidate: K) => CompressionParameters,
      target: CompressionTarget
    ): Effect.Effect<SweepTable<K>, CompressorError> =>
      pipe(
        logger.tune.sweepStarted(parameter, candidates),
        Effect.zipRight(
          Effect.forEach(candidates, (candidate) =>
            Effect.gen(function* () {
              yield* logger.tune.candidate(parameter, candidate)
              const totalBytes = yield* compressor.measure(target, parametersFor(candidate))
              yield* logger.tune.measured(parameter, candidate, totalBytes)
              return { candidate, totalBytes }
            })
          )
        )
      )

    return {
      sweep,

      sweepDictionarySizes: (target, largestDirectoryMB) =>
        sweep(
          "dictionarySize",
          dictionarySizeCandidates(largestDirectoryMB),
          (dictionarySize) => ({ dictionarySize }),
          target
        ),

      sweepWordSizes: (target, fixed) =>
        sweep(
          "wordSize",
          wordSizeCandidates(),
          (wordSize) => ({ dictionarySize: fixed.dictionarySize, wordSize }),
          target
        ),

      sweepBlockSizes: (target, fixed, largestDirectoryMB) =>
        sweep(
          "blockSize",
          blockSizeCandidates(largestDirectoryMB),
          (blockSize) => ({ ...fixed, blockSize }),
          target
        ),

      sweepThreadCounts: (target, fixed, maxThreads) =>
        sweep("threads", threadCandidates(maxThreads), (threads) => ({ ...fixed, threads }), target),

      best: (parameter, table) =>
        Option.match(smallest(table), {
          onNone: () => Effect.fail(new EmptySweep({ parameter })),
          onSome: (entry) => Effect.succeed(entry),
        }),
    } satisfies SweepService
  })
)
