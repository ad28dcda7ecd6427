export const HIDDEN_PREFIX = ".";

/** Reserved virtual-environment directory, never compressed. */
export const VIRTUAL_ENV_NAME = "venv";

export interface DirectorySize {
  readonly name: string;
  readonly sizeMB: number;
}

export const isCandidateDirectory = (name: string, excluded: ReadonlyArray<string>): boolean =>
  !name.startsWith(HIDDEN_PREFIX) && name !== VIRTUAL_ENV_NAME && !excluded.includes(name);

export const largestSizeMB = (sizes: ReadonlyArray<DirectorySize>): number =>
  sizes.reduce((largest, { sizeMB }) => Math.max(largest, sizeMB), 0);
