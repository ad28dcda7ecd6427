import { Match } from "effect";

import type {
  ShellError,
  WorkspaceNotFound,
  WorkspacePermissionDenied,
  WorkspaceFailed,
  NoDirectoriesFound,
  SizeProbeFailed,
  SizeProbeParseFailed,
  CompressorNotFound,
  CompressorFailed,
  NoArchivesProduced,
  EmptySweep,
  SweepParameter
} from "@core";
import { SWEEP_LABELS } from "@domain/SweepTable";
import type { InvalidOption } from "./optionParsing";

type WorkspaceError =
  | WorkspaceNotFound
  | WorkspacePermissionDenied
  | WorkspaceFailed
  | NoDirectoriesFound;

type ProbeError = SizeProbeFailed | SizeProbeParseFailed;

type CompressorError = CompressorNotFound | CompressorFailed | NoArchivesProduced;

type DomainError = ShellError | WorkspaceError | ProbeError | CompressorError | EmptySweep | InvalidOption;

const DOMAIN_ERROR_TAGS: ReadonlySet<string> = new Set<DomainError["_tag"]>([
  "ShellError",
  "WorkspaceNotFound",
  "WorkspacePermissionDenied",
  "WorkspaceFailed",
  "NoDirectoriesFound",
  "SizeProbeFailed",
  "SizeProbeParseFailed",
  "CompressorNotFound",
  "CompressorFailed",
  "NoArchivesProduced",
  "EmptySweep",
  "InvalidOption"
]);

export class AppError extends Error {
  readonly _tag = "AppError";

  constructor(
    readonly title: string,
    readonly detail: string,
    readonly suggestion: string
  ) {
    super(`${title}: ${detail}`);
  }

  format(): string {
    return [
      `ERROR: ${this.title}`,
      ``,
      `   ${this.detail}`,
      ``,
      `   Hint: ${this.suggestion}`
    ].join("\n");
  }
}

const errors = {
  compressorNotFound: (binary: string) =>
    new AppError(
      "Compressor not found",
      `Could not find the "${binary}" executable.`,
      `Install p7zip (e.g. 'apt install p7zip-full') or pass its location with --binary.`
    ),

  compressorFailed: (directory: string, exitCode: number, reason: string) =>
    new AppError(
      "Compression failed",
      `7z exited with code ${exitCode} while compressing "${directory}": ${reason}`,
      `Run the same 7z command by hand to see the full output. No results were kept.`
    ),

  noArchivesProduced: (path: string) =>
    new AppError(
      "No archives produced",
      `The compressor reported success but left no .7z archives in "${path}".`,
      `Check that the directories are readable and that --binary points at a 7z-compatible compressor.`
    ),

  workspaceNotFound: (path: string) =>
    new AppError(
      "Path not found",
      `The path "${path}" does not exist.`,
      `Pass the directory holding the folders to compress with --root.`
    ),

  workspacePermissionDenied: (path: string) =>
    new AppError(
      "Permission denied",
      `Cannot access "${path}": permission denied.`,
      `Check that you can read the working directory and write archives into it.`
    ),

  workspaceFailed: (path: string, reason: string) =>
    new AppError(
      "Workspace error",
      `Failed to access "${path}": ${reason}`,
      `Check the working directory and free disk space.`
    ),

  noDirectories: (path: string) =>
    new AppError(
      "Nothing to compress",
      `No directories were found in "${path}".`,
      `Hidden directories and 'venv' are skipped. Point --root at a directory with subdirectories.`
    ),

  sizeProbeFailed: (command: string, reason: string) =>
    new AppError(
      "Size probe failed",
      `"${command}" failed: ${reason}`,
      `The 'du' utility must be installed and able to read every directory.`
    ),

  sizeProbeParseFailed: (line: string) =>
    new AppError(
      "Size probe output not understood",
      line ? `Could not parse du output line "${line}".` : `du produced no output.`,
      `Make sure 'du' is GNU or BSD du supporting 'du -sm'.`
    ),

  emptySweep: (parameter: SweepParameter) =>
    new AppError(
      "Empty sweep",
      `No ${SWEEP_LABELS[parameter].toLowerCase()} candidates were left to test.`,
      `The size-based pruning removed every candidate. Please report this with the output of 'lzma-tune probe'.`
    ),

  invalidOption: (option: string, reason: string) =>
    new AppError("Invalid option", `--${option} ${reason}.`, `Run 'lzma-tune --help' for usage.`),

  shellFailed: (command: string, message: string) =>
    new AppError(
      "Command failed",
      `${message} (${command})`,
      `Check that the program exists and is executable.`
    ),

  unexpected: (message: string) =>
    new AppError("Unexpected error", message, `If this persists, please report this issue.`),

  permissionDenied: (message: string) =>
    new AppError(
      "Permission denied",
      message,
      `Check that you have the required permissions. You may need to run with elevated privileges.`
    )
};

const matchDomainError = Match.typeTags<DomainError>()({
  ShellError: (e) => errors.shellFailed(e.command, e.message),

  WorkspaceNotFound: (e) => errors.workspaceNotFound(e.path),
  WorkspacePermissionDenied: (e) => errors.workspacePermissionDenied(e.path),
  WorkspaceFailed: (e) => errors.workspaceFailed(e.path, e.reason),
  NoDirectoriesFound: (e) => errors.noDirectories(e.path),

  SizeProbeFailed: (e) => errors.sizeProbeFailed(e.command, e.reason),
  SizeProbeParseFailed: (e) => errors.sizeProbeParseFailed(e.line),

  CompressorNotFound: (e) => errors.compressorNotFound(e.binary),
  CompressorFailed: (e) => errors.compressorFailed(e.directory, e.exitCode, e.reason),
  NoArchivesProduced: (e) => errors.noArchivesProduced(e.path),

  EmptySweep: (e) => errors.emptySweep(e.parameter),

  InvalidOption: (e) => errors.invalidOption(e.option, e.reason)
});

const isDomainError = (e: unknown): e is DomainError =>
  typeof e === "object" &&
  e !== null &&
  "_tag" in e &&
  typeof e._tag === "string" &&
  DOMAIN_ERROR_TAGS.has(e._tag);

const isPermissionError = (message: string): boolean =>
  message.toLowerCase().includes("permission denied") ||
  message.toLowerCase().includes("eacces") ||
  message.toLowerCase().includes("operation not permitted") ||
  message.toLowerCase().includes("eperm");

export const fromDomainError = (error: unknown): AppError => {
  if (error instanceof AppError) {
    return error;
  }

  if (isDomainError(error)) {
    return matchDomainError(error);
  }

  if (error instanceof Error) {
    return isPermissionError(error.message)
      ? errors.permissionDenied(error.message)
      : errors.unexpected(error.message);
  }

  return errors.unexpected(String(error));
};

export const {
  compressorNotFound,
  compressorFailed,
  noArchivesProduced,
  workspaceNotFound,
  workspacePermissionDenied,
  workspaceFailed,
  noDirectories,
  sizeProbeFailed,
  sizeProbeParseFailed,
  emptySweep,
  invalidOption,
  shellFailed,
  unexpected,
  permissionDenied
} = errors;
