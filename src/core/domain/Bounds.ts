import { Array as Arr, Option, pipe } from "effect";
import {
  BLOCK_SIZES,
  DICTIONARY_SIZES,
  WORD_SIZES,
  megabytes,
  type BlockSize,
  type DictionarySize,
  type WordSize
} from "./CandidateTables";

/** Block-size pruning only applies to inputs smaller than this. */
export const BLOCK_SIZE_BOUND_LIMIT_MB = 1024;

/**
 * Smallest megabyte-suffixed dictionary size that exceeds the largest input
 * directory. None when every dictionary size fits inside it.
 */
export const dictionarySizeBound = (largestDirectoryMB: number): Option.Option<number> =>
  pipe(
    DICTIONARY_SIZES,
    Arr.filterMap(megabytes),
    Arr.findFirst((size) => size > largestDirectoryMB)
  );

export const blockSizeBound = (largestDirectoryMB: number): Option.Option<number> =>
  largestDirectoryMB < BLOCK_SIZE_BOUND_LIMIT_MB ? Option.some(largestDirectoryMB) : Option.none();

const withinBound =
  (bound: Option.Option<number>) =>
  (candidate: string): boolean =>
    Option.match(bound, {
      onNone: () => true,
      onSome: (limit) =>
        Option.match(megabytes(candidate), {
          onNone: () => true,
          onSome: (size) => size <= limit
        })
    });

export const dictionarySizeCandidates = (largestDirectoryMB: number): ReadonlyArray<DictionarySize> =>
  Arr.takeWhile(DICTIONARY_SIZES, withinBound(dictionarySizeBound(largestDirectoryMB)));

/**
 * Only megabyte-suffixed entries are checked: once every "m" entry fits under
 * the bound, the gigabyte entries that follow are all swept.
 */
export const blockSizeCandidates = (largestDirectoryMB: number): ReadonlyArray<BlockSize> =>
  Arr.takeWhile(BLOCK_SIZES, withinBound(blockSizeBound(largestDirectoryMB)));

export const wordSizeCandidates = (): ReadonlyArray<WordSize> => WORD_SIZES;

/** Descending, so the fastest setting comes first and wins ties. */
export const threadCandidates = (maxThreads: number): ReadonlyArray<number> =>
  Array.from({ length: Math.max(0, maxThreads) }, (_, i) => maxThreads - i);
