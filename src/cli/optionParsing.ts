import { availableParallelism } from "node:os";
import { Effect } from "effect";

export class InvalidOption extends Error {
  readonly _tag = "InvalidOption";

  constructor(
    readonly option: string,
    readonly reason: string
  ) {
    super(`--${option}: ${reason}`);
  }
}

export const splitCommaSeparated = (value: string | undefined): string[] =>
  value
    ? value
        .split(",")
        .map((s) => s.trim())
        .filter((s) => s.length > 0)
    : [];

export interface ParsedOptions {
  readonly root: string;
  readonly exclude: string[];
  readonly maxThreads: number;
}

export const parseOptions = (
  options: {
    root: string;
    exclude?: string;
    maxThreads?: number;
  },
  defaultThreads: number = availableParallelism()
): Effect.Effect<ParsedOptions, InvalidOption> =>
  Effect.gen(function* () {
    const root = options.root.trim();
    if (root.length === 0) {
      return yield* Effect.fail(new InvalidOption("root", "must not be empty"));
    }

    const maxThreads = options.maxThreads ?? defaultThreads;
    if (!Number.isInteger(maxThreads) || maxThreads < 1) {
      return yield* Effect.fail(
        new InvalidOption("max-threads", `must be a whole number of at least 1, got ${maxThreads}`)
      );
    }

    return {
      root,
      exclude: splitCommaSeparated(options.exclude),
      maxThreads
    };
  });
