/**
 * LZMA Tune CLI
 *
 * Finds near-optimal 7z LZMA settings for the directories in a working root
 * by compressing them over and over, one parameter at a time, and keeping
 * whichever value gives the smallest archives.
 *
 * Commands:
 *   tune  - Sweep dictionary, word, block size and threads, then compress with the winners
 *   probe - Show directory sizes and the candidates each sweep would try
 *
 * Example:
 *   $ lzma-tune tune                      # sweep the current directory
 *   $ lzma-tune tune --root ~/backups --exclude node_modules
 *   $ lzma-tune probe --max-threads 4
 */

import { Command } from "@effect/cli"
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect, Option, Logger, LogLevel } from "effect"

import * as Opts from "@cli/options"
import { runTune, runProbe, withErrorHandling, AppLive } from "@cli/handler"

// =============================================================================
// Tune subcommand
// =============================================================================

const tuneCommand = Command.make(
  "tune",
  {
    root: Opts.root,
    binary: Opts.binary,
    exclude: Opts.exclude,
    maxThreads: Opts.maxThreads,
    debug: Opts.debug,
  },
  (opts) => {
    const program = withErrorHandling(
      runTune({
        root: opts.root,
        binary: opts.binary,
        exclude: Option.getOrUndefined(opts.exclude),
        maxThreads: Option.getOrUndefined(opts.maxThreads),
        debug: opts.debug,
      })
    ).pipe(Effect.provide(AppLive))

    return opts.debug
      ? program.pipe(Effect.provide(Logger.minimumLogLevel(LogLevel.Debug)))
      : program
  }
).pipe(
  Command.withDescription("Search for the smallest-archive LZMA settings and compress with them")
)

// =============================================================================
// Probe subcommand
// =============================================================================

const probeCommand = Command.make(
  "probe",
  {
    root: Opts.root,
    exclude: Opts.exclude,
    maxThreads: Opts.maxThreads,
  },
  (opts) =>
    withErrorHandling(
      runProbe({
        root: opts.root,
        exclude: Option.getOrUndefined(opts.exclude),
        maxThreads: Option.getOrUndefined(opts.maxThreads),
      })
    ).pipe(Effect.provide(AppLive))
).pipe(
  Command.withDescription("Measure the directories and list each sweep's candidates without compressing")
)

// =============================================================================
// Root command
// =============================================================================

const rootCommand = Command.make("lzma-tune", {}).pipe(
  Command.withSubcommands([tuneCommand, probeCommand]),
  Command.withDescription("Tune 7z LZMA compression parameters by measurement")
)

// =============================================================================
// Run CLI
// =============================================================================

const cli = Command.run(rootCommand, {
  name: "lzma-tune",
  version: "0.1.0",
})

cli(process.argv).pipe(Effect.provide(NodeContext.layer), NodeRuntime.runMain)
