/**
 * CompressorService - runs the 7z binary over every target directory, one
 * archive per directory, and measures what it produced.
 */

import { Context, Data, Effect, Layer, Option, pipe } from "effect"
import { Path } from "@effect/platform"
import { ShellServiceTag, commandLine, type ShellError } from "../ShellService"
import { WorkspaceServiceTag, type WorkspaceError } from "../WorkspaceService"
import {
  archiveName,
  compressorArgs,
  parameterFlags,
  type CompressionParameters,
} from "@domain/CompressionParameters"

// =============================================================================
// Errors
// =============================================================================

export class CompressorNotFound extends Data.TaggedError("CompressorNotFound")<{
  readonly binary: string
}> {}

export class CompressorFailed extends Data.TaggedError("CompressorFailed")<{
  readonly directory: string
  readonly exitCode: number
  readonly reason: string
}> {}

export class NoArchivesProduced extends Data.TaggedError("NoArchivesProduced")<{
  readonly path: string
}> {}

export type CompressorError =
  | CompressorNotFound
  | CompressorFailed
  | NoArchivesProduced
  | ShellError
  | WorkspaceError

// =============================================================================
// Types
// =============================================================================

/** Everything one batch run needs apart from the parameters. */
export interface CompressionTarget {
  readonly binary: string
  readonly root: string
  readonly directories: ReadonlyArray<string>
}

// =============================================================================
// Service interface
// =============================================================================

export interface CompressorService {
  /** Resolve the compressor executable; fails before any sweep can start. */
  readonly locate: (binary: string) => Effect.Effect<string, CompressorNotFound | ShellError>
  /** Compress every directory with the same parameters, writing into outputDir. */
  readonly runAll: (
    target: CompressionTarget,
    parameters: CompressionParameters,
    outputDir: string
  ) => Effect.Effect<void, CompressorError>
  /**
   * Run one batch in a scratch directory and return the archive total. The
   * scratch directory and its archives are gone once this completes or fails.
   */
  readonly measure: (
    target: CompressionTarget,
    parameters: CompressionParameters
  ) => Effect.Effect<number, CompressorError>
  readonly totalArchiveSize: (directory: string) => Effect.Effect<number, WorkspaceError>
  readonly removeArchives: (directory: string) => Effect.Effect<void, WorkspaceError>
}

export class CompressorServiceTag extends Context.Tag("CompressorService")<
  CompressorServiceTag,
  CompressorService
>() {}

// =============================================================================
// Live implementation
// =============================================================================

export const CompressorServiceLive = Layer.effect(
  CompressorServiceTag,
  Effect.gen(function* () {
    const shell = yield* ShellServiceTag
    const workspace = yield* WorkspaceServiceTag
    const path = yield* Path.Path

    const compressDirectory = (
      target: CompressionTarget,
      parameters: CompressionParameters,
      outputDir: string,
      directory: string
    ) => {
      const args = compressorArgs(parameters, path.join(outputDir, archiveName(directory)), directory)
      return pipe(
        Effect.logDebug(commandLine(target.binary, args)),
        Effect.zipRight(shell.exec(target.binary, args, { cwd: target.root })),
        Effect.filterOrFail(
          (result) => result.exitCode === 0,
          (result) =>
            new CompressorFailed({
              directory,
              exitCode: result.exitCode,
              reason: result.stderr.trim() || `exit code ${result.exitCode}`,
            })
        ),
        Effect.asVoid
      )
    }

    const runAll = (target: CompressionTarget, parameters: CompressionParameters, outputDir: string) =>
      Effect.forEach(
        target.directories,
        (directory) => compressDirectory(target, parameters, outputDir, directory),
        { discard: true }
      )

    const archiveTotal = (directory: string) =>
      pipe(
        workspace.totalArchiveSize(directory),
        Effect.filterOrFail(
          (total) => total > 0,
          () => new NoArchivesProduced({ path: directory })
        )
      )

    return {
      locate: (binary) =>
        pipe(
          shell.which(binary),
          Effect.flatMap(
            Option.match({
              onNone: () => Effect.fail(new CompressorNotFound({ binary })),
              onSome: (resolved) => Effect.succeed(resolved),
            })
          )
        ),

      runAll,

      measure: (target, parameters) =>
        Effect.scoped(
          Effect.gen(function* () {
            const scratch = yield* workspace.scratchDirectory(target.root)
            yield* runAll(target, parameters, scratch)
            const total = yield* archiveTotal(scratch)
            yield* Effect.logDebug(`${parameterFlags(parameters).join(" ") || "(defaults)"} -> ${total} bytes`)
            return total
          })
        ),

      totalArchiveSize: workspace.totalArchiveSize,

      removeArchives: workspace.removeArchives,
    } satisfies CompressorService
  })
)
