/**
 * SizeProbeService - disk usage of the directories to compress, via `du -sm`.
 *
 * `du -m` rounds every entry up to a whole megabyte, so a non-empty
 * directory never reports 0.
 */

import { Context, Data, Effect, Layer, pipe } from "effect"
import { ShellServiceTag, commandLine, type ShellError } from "../ShellService"
import type { DirectorySize } from "@domain/Directory"

export class SizeProbeFailed extends Data.TaggedError("SizeProbeFailed")<{
  readonly command: string
  readonly reason: string
}> {}

export class SizeProbeParseFailed extends Data.TaggedError("SizeProbeParseFailed")<{
  readonly line: string
}> {}

export type SizeProbeError = SizeProbeFailed | SizeProbeParseFailed | ShellError

export interface SizeProbeService {
  readonly measure: (
    root: string,
    directories: ReadonlyArray<string>
  ) => Effect.Effect<DirectorySize[], SizeProbeError>
}

export class SizeProbeServiceTag extends Context.Tag("SizeProbeService")<
  SizeProbeServiceTag,
  SizeProbeService
>() {}

const DU_LINE = /^(\d+)\s+(.+?)\/?$/

export const parseDuOutput = (stdout: string): Effect.Effect<DirectorySize[], SizeProbeParseFailed> => {
  const lines = stdout.split("\n").filter((line) => line.trim().length > 0)

  if (lines.length === 0) {
    return Effect.fail(new SizeProbeParseFailed({ line: "" }))
  }

  return Effect.forEach(lines, (line) => {
    const match = line.match(DU_LINE)
    const size = match?.[1]
    const name = match?.[2]
    return size === undefined || name === undefined
      ? Effect.fail(new SizeProbeParseFailed({ line }))
      : Effect.succeed({ name, sizeMB: parseInt(size, 10) })
  })
}

export const SizeProbeServiceLive = Layer.effect(
  SizeProbeServiceTag,
  Effect.gen(function* () {
    const shell = yield* ShellServiceTag

    const measure = (root: string, directories: ReadonlyArray<string>) => {
      const args = ["-sm", "--", ...directories]
      return pipe(
        shell.exec("du", args, { cwd: root }),
        Effect.filterOrFail(
          (result) => result.exitCode === 0,
          (result) =>
            new SizeProbeFailed({
              command: commandLine("du", args),
              reason: result.stderr.trim() || `exit code ${result.exitCode}`,
            })
        ),
        Effect.flatMap((result) => parseDuOutput(result.stdout)),
        Effect.tap((sizes) =>
          Effect.logDebug(`du: ${sizes.map((s) => `${s.name}=${s.sizeMB}MB`).join(", ")}`)
        )
      )
    }

    return { measure } satisfies SizeProbeService
  })
)
