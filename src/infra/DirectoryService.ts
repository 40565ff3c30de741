/**
 * DirectoryService - lists one directory level for testability.
 *
 * Live implementation uses node:fs/promises `readdir` with file types, so a
 * symbolic link to a directory is reported as a link, not as a directory.
 * All errors are caught and converted to typed errors.
 */

import { readdir } from "node:fs/promises"
import { Context, Data, Effect, Layer, pipe } from "effect"
import { classifyIoError } from "./ioError"
import { comparePaths } from "../lib/paths"

// =============================================================================
// Typed errors - all possible failures from readdir
// =============================================================================

export class DirectoryNotFound extends Data.TaggedError("DirectoryNotFound")<{
  readonly path: string
}> {}

export class DirectoryPermissionDenied extends Data.TaggedError("DirectoryPermissionDenied")<{
  readonly path: string
}> {}

export class NotADirectory extends Data.TaggedError("NotADirectory")<{
  readonly path: string
}> {}

export class DirectoryUnknownError extends Data.TaggedError("DirectoryUnknownError")<{
  readonly path: string
  readonly cause: string
}> {}

export type DirectoryError =
  | DirectoryNotFound
  | DirectoryPermissionDenied
  | NotADirectory
  | DirectoryUnknownError

// =============================================================================
// Service interface
// =============================================================================

export interface DirectoryEntry {
  readonly name: string
  /** Real directories only - links to directories are `false` */
  readonly isDirectory: boolean
}

export interface DirectoryService {
  /** Entries of one directory, sorted by name */
  readonly list: (path: string) => Effect.Effect<DirectoryEntry[], DirectoryError>
}

export class DirectoryServiceTag extends Context.Tag("DirectoryService")<
  DirectoryServiceTag,
  DirectoryService
>() {}

// =============================================================================
// Error detection
// =============================================================================

export const toDirectoryError = (path: string, error: unknown): DirectoryError => {
  const { kind, message } = classifyIoError(error)

  switch (kind) {
    case "not_found":
      return new DirectoryNotFound({ path })
    case "permission_denied":
      return new DirectoryPermissionDenied({ path })
    case "not_a_directory":
      return new NotADirectory({ path })
    case "unknown":
      return new DirectoryUnknownError({ path, cause: message })
  }
}

export const byName = (a: DirectoryEntry, b: DirectoryEntry): number => comparePaths(a.name, b.name)

// =============================================================================
// Live implementation (node:fs/promises)
// =============================================================================

export const DirectoryServiceLive = Layer.succeed(DirectoryServiceTag, {
  list: (path: string) =>
    pipe(
      Effect.tryPromise({
        try: () => readdir(path, { withFileTypes: true }),
        catch: (e) => toDirectoryError(path, e),
      }),
      Effect.map((dirents) =>
        dirents
          .map((dirent) => ({ name: dirent.name, isDirectory: dirent.isDirectory() }))
          .sort(byName)
      )
    ),
})
