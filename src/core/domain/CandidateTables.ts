import { Option } from "effect";

/**
 * Legal values for each swept parameter, in ascending magnitude.
 * 273 is the largest fast-bytes value the LZMA format accepts.
 */
export const WORD_SIZES = [8, 12, 16, 24, 32, 48, 64, 96, 128, 192, 256, 273] as const;

export const DICTIONARY_SIZES = [
  "64k", "1m", "2m", "3m", "4m",
  "6m", "8m", "12m", "16m", "24m",
  "32m", "48m", "64m", "96m", "128m",
  "192m", "256m", "384m", "512m", "768m",
  "1024m", "1536m"
] as const;

export const BLOCK_SIZES = [
  "=off", "=on", "1m", "2m", "3m",
  "4m", "6m", "8m", "12m", "16m",
  "32m", "64m", "128m", "256m", "512m",
  "1g", "2g", "4g", "8g", "16g",
  "32g", "64g"
] as const;

export type WordSize = (typeof WORD_SIZES)[number];
export type DictionarySize = (typeof DICTIONARY_SIZES)[number];
export type BlockSize = (typeof BLOCK_SIZES)[number];

export type MagnitudeUnit = "k" | "m" | "g";

export interface Magnitude {
  readonly amount: number;
  readonly unit: MagnitudeUnit;
}

const MAGNITUDE_PATTERN = /^(\d+)([kmg])$/;

const isMagnitudeUnit = (unit: string): unit is MagnitudeUnit =>
  unit === "k" || unit === "m" || unit === "g";

/** Sentinel block modes ("=off", "=on") have no magnitude. */
export const parseMagnitude = (value: string): Option.Option<Magnitude> => {
  const match = value.match(MAGNITUDE_PATTERN);
  const amount = match?.[1];
  const unit = match?.[2];

  if (amount === undefined || unit === undefined || !isMagnitudeUnit(unit)) {
    return Option.none();
  }

  return Option.some({ amount: parseInt(amount, 10), unit });
};

/**
 * Numeric value of a megabyte-suffixed candidate. Kilobyte, gigabyte and
 * sentinel candidates yield none and are never compared against a bound.
 */
export const megabytes = (value: string): Option.Option<number> =>
  Option.flatMap(parseMagnitude(value), ({ amount, unit }) =>
    unit === "m" ? Option.some(amount) : Option.none()
  );
