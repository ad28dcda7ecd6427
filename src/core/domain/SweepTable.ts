import { Option } from "effect";

export type SweepParameter = "dictionarySize" | "wordSize" | "blockSize" | "threads";

export const SWEEP_LABELS: Record<SweepParameter, string> = {
  dictionarySize: "Dict size",
  wordSize: "Word size",
  blockSize: "Block size",
  threads: "Threads"
};

export interface SweepEntry<K> {
  readonly candidate: K;
  readonly totalBytes: number;
}

/** Entries in the order the candidates were measured. */
export type SweepTable<K> = ReadonlyArray<SweepEntry<K>>;

/**
 * Entry with the minimum total size. Ties keep the earliest entry, so the
 * sweep's iteration order decides between equal results.
 */
export const smallest = <K>(table: SweepTable<K>): Option.Option<SweepEntry<K>> =>
  table.reduce<Option.Option<SweepEntry<K>>>(
    (best, entry) =>
      Option.match(best, {
        onNone: () => Option.some(entry),
        onSome: (current) => (entry.totalBytes < current.totalBytes ? Option.some(entry) : best)
      }),
    Option.none()
  );
