/**
 * WorkspaceService - the working root: which directories get compressed,
 * which archives exist, and the scratch space measured runs write into.
 */

import { Context, Data, Effect, Layer, pipe, type Scope } from "effect"
import { FileSystem, Path } from "@effect/platform"
import type { PlatformError } from "@effect/platform/Error"
import { isCandidateDirectory } from "@domain/Directory"
import { isArchiveName } from "@domain/CompressionParameters"

// =============================================================================
// Errors
// =============================================================================

export class WorkspaceNotFound extends Data.TaggedError("WorkspaceNotFound")<{
  readonly path: string
}> {}

export class WorkspacePermissionDenied extends Data.TaggedError("WorkspacePermissionDenied")<{
  readonly path: string
}> {}

export class WorkspaceFailed extends Data.TaggedError("WorkspaceFailed")<{
  readonly path: string
  readonly reason: string
}> {}

export class NoDirectoriesFound extends Data.TaggedError("NoDirectoriesFound")<{
  readonly path: string
}> {}

export type WorkspaceError =
  | WorkspaceNotFound
  | WorkspacePermissionDenied
  | WorkspaceFailed
  | NoDirectoriesFound

// =============================================================================
// Service interface
// =============================================================================

export interface WorkspaceService {
  /** Top-level directories to compress, sorted by name. Never cached. */
  readonly listDirectories: (
    root: string,
    excluded: ReadonlyArray<string>
  ) => Effect.Effect<string[], WorkspaceError>
  readonly listArchives: (directory: string) => Effect.Effect<string[], WorkspaceError>
  readonly totalArchiveSize: (directory: string) => Effect.Effect<number, WorkspaceError>
  readonly removeArchives: (directory: string) => Effect.Effect<void, WorkspaceError>
  /** Hidden directory under root, deleted with its contents when the scope closes. */
  readonly scratchDirectory: (root: string) => Effect.Effect<string, WorkspaceError, Scope.Scope>
}

export class WorkspaceServiceTag extends Context.Tag("WorkspaceService")<
  WorkspaceServiceTag,
  WorkspaceService
>() {}

export const SCRATCH_PREFIX = ".lzma-tune-"

const toWorkspaceError = (path: string, error: PlatformError): WorkspaceError => {
  if (error._tag === "SystemError") {
    if (error.reason === "NotFound") {
      return new WorkspaceNotFound({ path })
    }
    if (error.reason === "PermissionDenied") {
      return new WorkspacePermissionDenied({ path })
    }
  }

  return new WorkspaceFailed({ path, reason: error.message })
}

// =============================================================================
// Live implementation
// =============================================================================

export const WorkspaceServiceLive = Layer.effect(
  WorkspaceServiceTag,
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem
    const path = yield* Path.Path

    const entriesOfType = (directory: string, type: FileSystem.File.Type) =>
      pipe(
        fs.readDirectory(directory),
        Effect.flatMap((names) =>
          Effect.filter(names, (name) =>
            pipe(
              fs.stat(path.join(directory, name)),
              Effect.map((info) => info.type === type),
              // Dangling symlinks, or entries gone since the listing, are neither
              Effect.catchTag("SystemError", (e) =>
                e.reason === "NotFound" ? Effect.succeed(false) : Effect.fail(e)
              )
            )
          )
        ),
        Effect.map((names) => names.sort()),
        Effect.mapError((e) => toWorkspaceError(directory, e))
      )

    const listArchives = (directory: string) =>
      pipe(
        entriesOfType(directory, "File"),
        Effect.map((names) => names.filter(isArchiveName).map((name) => path.join(directory, name)))
      )

    return {
      listDirectories: (root, excluded) =>
        pipe(
          entriesOfType(root, "Directory"),
          Effect.map((names) => names.filter((name) => isCandidateDirectory(name, excluded))),
          Effect.filterOrFail(
            (names) => names.length > 0,
            () => new NoDirectoriesFound({ path: root })
          )
        ),

      listArchives,

      totalArchiveSize: (directory) =>
        pipe(
          listArchives(directory),
          Effect.flatMap((archives) =>
            Effect.forEach(archives, (archive) =>
              pipe(
                fs.stat(archive),
                Effect.map((info) => Number(info.size)),
                Effect.mapError((e) => toWorkspaceError(archive, e))
              )
            )
          ),
          Effect.map((sizes) => sizes.reduce((total, size) => total + size, 0))
        ),

      removeArchives: (directory) =>
        pipe(
          listArchives(directory),
          Effect.flatMap((archives) =>
            Effect.forEach(
              archives,
              (archive) =>
                pipe(
                  fs.remove(archive),
                  Effect.tap(() => Effect.logDebug(`Removed ${archive}`)),
                  Effect.mapError((e) => toWorkspaceError(archive, e))
                ),
              { discard: true }
            )
          )
        ),

      scratchDirectory: (root) =>
        pipe(
          fs.makeTempDirectoryScoped({ directory: root, prefix: SCRATCH_PREFIX }),
          Effect.tap((scratch) => Effect.logDebug(`Scratch directory ${scratch}`)),
          Effect.mapError((e) => toWorkspaceError(root, e))
        ),
    } satisfies WorkspaceService
  })
)
