import { Effect, Layer, pipe } from "effect";
import { Path } from "@effect/platform";
import { NodeContext } from "@effect/platform-node";

export interface TuneConfig {
  readonly root: string;
  readonly binary: string;
  readonly exclude: ReadonlyArray<string>;
  readonly maxThreads: number;
}

export interface ProbeConfig {
  readonly root: string;
  readonly exclude: ReadonlyArray<string>;
  readonly maxThreads: number;
}

export type { DirectorySize } from "./domain/Directory";
export type { CompressionParameters, WinningParameters } from "./domain/CompressionParameters";
export type { SweepEntry, SweepTable, SweepParameter } from "./domain/SweepTable";
export type { BlockSize, DictionarySize, WordSize } from "./domain/CandidateTables";

export type { ShellError } from "./services/ShellService";
export type {
  WorkspaceNotFound,
  WorkspacePermissionDenied,
  WorkspaceFailed,
  NoDirectoriesFound
} from "./services/WorkspaceService";
export type { SizeProbeFailed, SizeProbeParseFailed } from "./services/SizeProbeService";
export type {
  CompressorNotFound,
  CompressorFailed,
  NoArchivesProduced
} from "./services/CompressorService";
export type { EmptySweep } from "./services/SweepService";

import { ShellServiceLive } from "./services/ShellService";
import { WorkspaceServiceTag, WorkspaceServiceLive } from "./services/WorkspaceService";
import { SizeProbeServiceTag, SizeProbeServiceLive } from "./services/SizeProbeService";
import { CompressorServiceTag, CompressorServiceLive } from "./services/CompressorService";
import { SweepServiceTag, SweepServiceLive } from "./services/SweepService";
import { LoggerServiceTag, LoggerServiceLive } from "./services/LoggerService";

import type { WinningParameters } from "./domain/CompressionParameters";
import type { BlockSize, DictionarySize, WordSize } from "./domain/CandidateTables";
import type { SweepTable } from "./domain/SweepTable";
import { largestSizeMB, type DirectorySize } from "./domain/Directory";
import {
  blockSizeCandidates,
  dictionarySizeCandidates,
  threadCandidates,
  wordSizeCandidates
} from "./domain/Bounds";

export interface TuneResult {
  readonly parameters: WinningParameters;
  readonly sweeps: {
    readonly dictionarySize: SweepTable<DictionarySize>;
    readonly wordSize: SweepTable<WordSize>;
    readonly blockSize: SweepTable<BlockSize>;
    readonly threads: SweepTable<number>;
  };
  readonly largestDirectoryMB: number;
  readonly finalArchiveBytes: number;
}

export interface ProbeResult {
  readonly directories: ReadonlyArray<DirectorySize>;
  readonly largestDirectoryMB: number;
  readonly candidates: {
    readonly dictionarySize: ReadonlyArray<DictionarySize>;
    readonly wordSize: ReadonlyArray<WordSize>;
    readonly blockSize: ReadonlyArray<BlockSize>;
    readonly threads: ReadonlyArray<number>;
  };
}

/**
 * Greedy search: dictionary size, then word size, then block size, then
 * thread count. Each winner is fixed for every later sweep and never
 * revisited. Ends with one more run using all four winners, whose archives
 * stay in the working root.
 */
export const tuneParameters = (config: TuneConfig) =>
  Effect.gen(function* () {
    const workspace = yield* WorkspaceServiceTag;
    const sizeProbe = yield* SizeProbeServiceTag;
    const compressor = yield* CompressorServiceTag;
    const sweeps = yield* SweepServiceTag;
    const logger = yield* LoggerServiceTag;
    const path = yield* Path.Path;

    // Archive paths are built from the root and the compressor runs inside
    // it, so a relative root would be applied twice.
    const root = path.resolve(config.root);

    yield* logger.tune.header(root);

    const binary = yield* compressor.locate(config.binary);
    yield* logger.tune.compressorFound(binary);

    yield* compressor.removeArchives(root);

    const directories = yield* workspace.listDirectories(root, config.exclude);
    const sizes = yield* sizeProbe.measure(root, directories);
    const largestDirectoryMB = largestSizeMB(sizes);
    yield* logger.tune.directories(sizes, largestDirectoryMB);

    const target = { binary, root, directories };

    const dictionaryTable = yield* sweeps.sweepDictionarySizes(target, largestDirectoryMB);
    const dictionary = yield* sweeps.best("dictionarySize", dictionaryTable);
    yield* logger.tune.best("dictionarySize", dictionary);

    const wordTable = yield* sweeps.sweepWordSizes(target, {
      dictionarySize: dictionary.candidate
    });
    const word = yield* sweeps.best("wordSize", wordTable);
    yield* logger.tune.best("wordSize", word);

    const blockTable = yield* sweeps.sweepBlockSizes(
      target,
      { dictionarySize: dictionary.candidate, wordSize: word.candidate },
      largestDirectoryMB
    );
    const block = yield* sweeps.best("blockSize", blockTable);
    yield* logger.tune.best("blockSize", block);

    const threadTable = yield* sweeps.sweepThreadCounts(
      target,
      {
        dictionarySize: dictionary.candidate,
        wordSize: word.candidate,
        blockSize: block.candidate
      },
      config.maxThreads
    );
    const threads = yield* sweeps.best("threads", threadTable);
    yield* logger.tune.best("threads", threads);

    const parameters: WinningParameters = {
      dictionarySize: dictionary.candidate,
      wordSize: word.candidate,
      blockSize: block.candidate,
      threads: threads.candidate
    };

    yield* logger.tune.finalRun(parameters);
    yield* compressor.runAll(target, parameters, root);
    const finalArchiveBytes = yield* compressor.totalArchiveSize(root);
    yield* logger.tune.complete(parameters, finalArchiveBytes);

    return {
      parameters,
      sweeps: {
        dictionarySize: dictionaryTable,
        wordSize: wordTable,
        blockSize: blockTable,
        threads: threadTable
      },
      largestDirectoryMB,
      finalArchiveBytes
    } satisfies TuneResult;
  });

/**
 * Everything `tuneParameters` decides before compressing anything: the
 * directories, their sizes and each sweep's pruned candidate list.
 */
export const probeWorkspace = (config: ProbeConfig) =>
  Effect.gen(function* () {
    const workspace = yield* WorkspaceServiceTag;
    const sizeProbe = yield* SizeProbeServiceTag;
    const logger = yield* LoggerServiceTag;
    const path = yield* Path.Path;
    const root = path.resolve(config.root);

    yield* logger.probe.header(root);

    const directories = yield* workspace.listDirectories(root, config.exclude);
    const sizes = yield* sizeProbe.measure(root, directories);
    const largestDirectoryMB = largestSizeMB(sizes);
    yield* logger.probe.directories(sizes, largestDirectoryMB);

    const candidates = {
      dictionarySize: dictionarySizeCandidates(largestDirectoryMB),
      wordSize: wordSizeCandidates(),
      blockSize: blockSizeCandidates(largestDirectoryMB),
      threads: threadCandidates(config.maxThreads)
    };

    yield* logger.probe.candidates("dictionarySize", candidates.dictionarySize);
    yield* logger.probe.candidates("wordSize", candidates.wordSize);
    yield* logger.probe.candidates("blockSize", candidates.blockSize);
    yield* logger.probe.candidates("threads", candidates.threads);

    return { directories: sizes, largestDirectoryMB, candidates } satisfies ProbeResult;
  });

export const createAppLayer = () => {
  const ShellWithPlatform = pipe(ShellServiceLive, Layer.provide(NodeContext.layer));
  const WorkspaceWithPlatform = pipe(WorkspaceServiceLive, Layer.provide(NodeContext.layer));
  const SizeProbe = pipe(SizeProbeServiceLive, Layer.provide(ShellWithPlatform));
  const Compressor = pipe(
    CompressorServiceLive,
    Layer.provide(ShellWithPlatform),
    Layer.provide(WorkspaceWithPlatform),
    Layer.provide(NodeContext.layer)
  );
  const Sweeps = pipe(SweepServiceLive, Layer.provide(Compressor), Layer.provide(LoggerServiceLive));

  return Layer.mergeAll(LoggerServiceLive, WorkspaceWithPlatform, SizeProbe, Compressor, Sweeps, NodeContext.layer);
};

export const AppLive = createAppLayer();
