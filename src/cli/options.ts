import { Options } from "@effect/cli";

export const root = Options.directory("root").pipe(
  Options.withDescription("Working directory whose top-level directories get compressed"),
  Options.withDefault(".")
);

export const binary = Options.text("binary").pipe(
  Options.withDescription("Compressor executable, looked up on PATH unless it is a path"),
  Options.withDefault("7z")
);

export const exclude = Options.text("exclude").pipe(
  Options.withDescription("Extra top-level directories to skip (comma-separated). 'venv' is always skipped."),
  Options.optional
);

export const maxThreads = Options.integer("max-threads").pipe(
  Options.withDescription("Highest thread count to try (default: logical core count)"),
  Options.optional
);

export const debug = Options.boolean("debug").pipe(
  Options.withDescription("Enable verbose debug logging"),
  Options.withDefault(false)
);

export interface TuneOptions {
  readonly root: string;
  readonly binary: string;
  readonly exclude: string | undefined;
  readonly maxThreads: number | undefined;
  readonly debug?: boolean;
}

export interface ProbeOptions {
  readonly root: string;
  readonly exclude: string | undefined;
  readonly maxThreads: number | undefined;
}
