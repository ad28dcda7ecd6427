/**
 * LoggerService - formatted console output for the tune and probe commands
 */

import { Context, Effect, Layer, Console } from "effect"
import { formatBytes, formatSize } from "@lib/formatSize"
import type { DirectorySize } from "@domain/Directory"
import { SWEEP_LABELS, type SweepEntry, type SweepParameter } from "@domain/SweepTable"
import { parameterFlags, type CompressionParameters } from "@domain/CompressionParameters"

type Candidate = string | number

// =============================================================================
// Service interface
// =============================================================================

export interface LoggerService {
  readonly tune: {
    readonly header: (root: string) => Effect.Effect<void>
    readonly compressorFound: (binary: string) => Effect.Effect<void>
    readonly directories: (sizes: ReadonlyArray<DirectorySize>, largestMB: number) => Effect.Effect<void>
    readonly sweepStarted: (parameter: SweepParameter, candidates: ReadonlyArray<Candidate>) => Effect.Effect<void>
    readonly candidate: (parameter: SweepParameter, value: Candidate) => Effect.Effect<void>
    readonly measured: (parameter: SweepParameter, value: Candidate, totalBytes: number) => Effect.Effect<void>
    readonly best: (parameter: SweepParameter, entry: SweepEntry<Candidate>) => Effect.Effect<void>
    readonly finalRun: (parameters: CompressionParameters) => Effect.Effect<void>
    readonly complete: (parameters: CompressionParameters, totalBytes: number) => Effect.Effect<void>
  }
  readonly probe: {
    readonly header: (root: string) => Effect.Effect<void>
    readonly directories: (sizes: ReadonlyArray<DirectorySize>, largestMB: number) => Effect.Effect<void>
    readonly candidates: (parameter: SweepParameter, candidates: ReadonlyArray<Candidate>) => Effect.Effect<void>
  }
}

export class LoggerServiceTag extends Context.Tag("LoggerService")<
  LoggerServiceTag,
  LoggerService
>() {}

// =============================================================================
// Implementation
// =============================================================================

const directoryTable = (sizes: ReadonlyArray<DirectorySize>, largestMB: number) =>
  Effect.gen(function* () {
    for (const { name, sizeMB } of sizes) {
      yield* Console.log(`   ${name}/: ${sizeMB} MB`)
    }
    yield* Console.log(`   Largest: ${largestMB} MB`)
  })

export const LoggerServiceLive = Layer.succeed(LoggerServiceTag, {
  tune: {
    header: (root) => Console.log(`\n🗜️  LZMA Tune - ${root}\n`),
    compressorFound: (binary) => Console.log(`✓ Using compressor ${binary}`),
    directories: (sizes, largestMB) =>
      Effect.gen(function* () {
        yield* Console.log(`\n📁 Directories (${sizes.length}):`)
        yield* directoryTable(sizes, largestMB)
      }),
    sweepStarted: (parameter, candidates) =>
      Console.log(`\n🔍 Sweeping ${SWEEP_LABELS[parameter].toLowerCase()} (${candidates.length} candidates)`),
    candidate: (parameter, value) => Console.log(`${SWEEP_LABELS[parameter]}: ${value}`),
    measured: (parameter, value, totalBytes) =>
      Effect.logDebug(`${SWEEP_LABELS[parameter]} ${value}: ${formatBytes(totalBytes)} bytes`),
    best: (parameter, entry) =>
      Console.log(
        `✓ Best ${SWEEP_LABELS[parameter].toLowerCase()}: ${entry.candidate} (${formatBytes(entry.totalBytes)} bytes, ${formatSize(entry.totalBytes)})`
      ),
    finalRun: (parameters) =>
      Console.log(`\nTesting done! Compressing with best values: ${parameterFlags(parameters).join(" ")}`),
    complete: (parameters, totalBytes) =>
      Effect.gen(function* () {
        yield* Console.log(`\n📊 Result:`)
        yield* Console.log(`   Dictionary size: ${parameters.dictionarySize ?? "default"}`)
        yield* Console.log(`   Word size: ${parameters.wordSize ?? "default"}`)
        yield* Console.log(`   Block size: ${parameters.blockSize ?? "default"}`)
        yield* Console.log(`   Threads: ${parameters.threads ?? "default"}`)
        yield* Console.log(`   Archives: ${formatBytes(totalBytes)} bytes (${formatSize(totalBytes)})\n`)
      }),
  },
  probe: {
    header: (root) => Console.log(`\n🗜️  LZMA Tune - Probe ${root}\n`),
    directories: (sizes, largestMB) =>
      Effect.gen(function* () {
        yield* Console.log(`📁 Directories (${sizes.length}):`)
        yield* directoryTable(sizes, largestMB)
      }),
    candidates: (parameter, candidates) =>
      Console.log(`   ${SWEEP_LABELS[parameter]} (${candidates.length}): ${candidates.join(", ")}`),
  },
} satisfies LoggerService)
