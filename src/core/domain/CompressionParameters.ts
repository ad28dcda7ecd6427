import type { BlockSize, DictionarySize, WordSize } from "./CandidateTables";

/** Always compress at the highest level; it is never swept. */
export const COMPRESSION_LEVEL = 9;

export const ARCHIVE_EXTENSION = ".7z";

/**
 * A (possibly partial) parameter combination. Unset fields fall back to the
 * compressor's own defaults.
 */
export interface CompressionParameters {
  readonly dictionarySize?: DictionarySize;
  readonly wordSize?: WordSize;
  readonly blockSize?: BlockSize;
  readonly threads?: number;
}

export interface WinningParameters {
  readonly dictionarySize: DictionarySize;
  readonly wordSize: WordSize;
  readonly blockSize: BlockSize;
  readonly threads: number;
}

export const archiveName = (directory: string): string => `${directory}${ARCHIVE_EXTENSION}`;

export const isArchiveName = (name: string): boolean =>
  name.endsWith(ARCHIVE_EXTENSION) && name.length > ARCHIVE_EXTENSION.length;

export const parameterFlags = (parameters: CompressionParameters): string[] => [
  ...(parameters.dictionarySize ? [`-md${parameters.dictionarySize}`] : []),
  ...(parameters.wordSize ? [`-mfb${parameters.wordSize}`] : []),
  ...(parameters.blockSize ? [`-ms${parameters.blockSize}`] : []),
  ...(parameters.threads ? [`-mmt${parameters.threads}`] : [])
];

/**
 * Arguments for one `7z a` invocation. Built fresh for every directory so no
 * two runs share a mutable command list.
 */
export const compressorArgs = (
  parameters: CompressionParameters,
  archivePath: string,
  directory: string
): string[] => ["a", `-mx${COMPRESSION_LEVEL}`, ...parameterFlags(parameters), "--", archivePath, directory];
