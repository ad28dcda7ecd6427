/**
 * ShellService - wraps child process execution for testability.
 */

import { delimiter } from "node:path"
import { Command, CommandExecutor, FileSystem, Path } from "@effect/platform"
import { Config, Context, Data, Effect, Layer, Option, Stream, pipe } from "effect"

// =============================================================================
// Errors
// =============================================================================

export class ShellError extends Data.TaggedError("ShellError")<{
  readonly message: string
  readonly command: string
  readonly exitCode?: number
}> {}

// =============================================================================
// Types
// =============================================================================

export interface ShellResult {
  readonly stdout: string
  readonly stderr: string
  readonly exitCode: number
}

export interface ExecOptions {
  readonly cwd?: string
}

// =============================================================================
// Service interface
// =============================================================================

export interface ShellService {
  /** Run a program directly (no shell) and wait for it to exit. */
  readonly exec: (
    command: string,
    args: ReadonlyArray<string>,
    options?: ExecOptions
  ) => Effect.Effect<ShellResult, ShellError>
  /** Resolve a program name to an executable file on PATH, or check an explicit path. */
  readonly which: (command: string) => Effect.Effect<Option.Option<string>, ShellError>
}

export class ShellServiceTag extends Context.Tag("ShellService")<
  ShellServiceTag,
  ShellService
>() {}

export const commandLine = (command: string, args: ReadonlyArray<string>): string =>
  [command, ...args].join(" ")

// =============================================================================
// Live implementation (uses @effect/platform Command)
// =============================================================================

const collect = <E>(stream: Stream.Stream<Uint8Array, E>) =>
  pipe(stream, Stream.decodeText(), Stream.mkString)

export const ShellServiceLive = Layer.effect(
  ShellServiceTag,
  Effect.gen(function* () {
    const executor = yield* CommandExecutor.CommandExecutor
    const fs = yield* FileSystem.FileSystem
    const path = yield* Path.Path

    const isExecutable = (candidate: string) =>
      pipe(
        fs.stat(candidate),
        Effect.map((info) => info.type === "File" && (info.mode & 0o111) !== 0),
        Effect.catchTag("SystemError", (e) =>
          e.reason === "NotFound" ? Effect.succeed(false) : Effect.fail(e)
        )
      )

    const exec = (command: string, args: ReadonlyArray<string>, options: ExecOptions = {}) =>
      pipe(
        Command.make(command, ...args),
        (cmd) => (options.cwd ? Command.workingDirectory(cmd, options.cwd) : cmd),
        Command.start,
        Effect.flatMap((proc) =>
          Effect.all(
            {
              exitCode: proc.exitCode,
              stdout: collect(proc.stdout),
              stderr: collect(proc.stderr),
            },
            { concurrency: "unbounded" }
          )
        ),
        Effect.map(({ exitCode, stdout, stderr }) => ({ stdout, stderr, exitCode: Number(exitCode) })),
        Effect.scoped,
        Effect.provideService(CommandExecutor.CommandExecutor, executor),
        Effect.mapError(
          (e) =>
            new ShellError({
              message: `Shell command failed: ${e.message}`,
              command: commandLine(command, args),
            })
        )
      )

    const which = (command: string) =>
      Effect.gen(function* () {
        if (command.includes(path.sep)) {
          return (yield* isExecutable(command)) ? Option.some(command) : Option.none()
        }

        const searchPath = yield* Config.string("PATH").pipe(Config.withDefault(""))
        const directories = searchPath.split(delimiter).filter((dir) => dir.length > 0)

        for (const directory of directories) {
          const candidate = path.join(directory, command)
          if (yield* isExecutable(candidate)) {
            return Option.some(candidate)
          }
        }

        return Option.none<string>()
      }).pipe(
        Effect.mapError(
          (e) => new ShellError({ message: `Could not resolve executable: ${String(e)}`, command })
        )
      )

    return { exec, which } satisfies ShellService
  })
)
