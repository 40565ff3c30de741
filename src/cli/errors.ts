import { Match } from "effect";

import type { WalkError } from "../services/TreeWalker";
import type { SnapshotStorageError } from "../infra/SnapshotStorageService";

/** Every failure a snapshot run can end with */
export type DomainError = WalkError | SnapshotStorageError;

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
  rootNotFound: (path: string) =>
    new AppError(
      "Path not found",
      `The path "${path}" does not exist.`,
      `Check the --path argument. Relative paths are resolved against the current directory.`
    ),

  rootNotADirectory: (path: string) =>
    new AppError(
      "Not a directory",
      `The path "${path}" exists but is not a directory.`,
      `Snapshots start from a directory. Pass its parent directory and use --ignore to leave out siblings.`
    ),

  rootPermissionDenied: (path: string) =>
    new AppError(
      "Permission denied",
      `Cannot read directory "${path}": permission denied.`,
      `Run the command with appropriate permissions (e.g., sudo) to snapshot protected directories.`
    ),

  walkFailed: (path: string, reason: string) =>
    new AppError(
      "Snapshot failed",
      `Could not read "${path}": ${reason}`,
      `Check that the path is accessible and the filesystem is healthy.`
    ),

  outputPermissionDenied: (path: string) =>
    new AppError(
      "Cannot write snapshot",
      `Permission denied writing "${path}".`,
      `Check that you have write permission to the directory, or choose another file with --output.`
    ),

  outputSaveFailed: (path: string, reason: string) =>
    new AppError(
      "Cannot save snapshot",
      `Failed to save snapshot to "${path}": ${reason}`,
      `Check that the directory exists and has free space, or choose another file with --output.`
    )
};

const matchDomainError = Match.typeTags<DomainError>()({
  WalkRootNotFound: (e) => errors.rootNotFound(e.path),
  WalkRootNotADirectory: (e) => errors.rootNotADirectory(e.path),
  WalkRootPermissionDenied: (e) => errors.rootPermissionDenied(e.path),
  WalkRootFailed: (e) => errors.walkFailed(e.path, e.reason),

  SnapshotPermissionDenied: (e) => errors.outputPermissionDenied(e.path),
  SnapshotSaveFailed: (e) => errors.outputSaveFailed(e.path, e.reason)
});

export const fromDomainError = (error: DomainError): AppError => matchDomainError(error);

export const {
  rootNotFound,
  rootNotADirectory,
  rootPermissionDenied,
  walkFailed,
  outputPermissionDenied,
  outputSaveFailed
} = errors;
