/**
 * FileStatService - wraps lstat for testability.
 *
 * Live implementation uses node:fs/promises `lstat`: symbolic links are
 * described as themselves and never followed. @effect/platform FileSystem
 * only offers a following `stat`.
 * All errors are caught and converted to typed errors.
 */

import { lstat } from "node:fs/promises"
import { Context, Data, Effect, Layer, pipe } from "effect"
import { classifyIoError } from "./ioError"

// =============================================================================
// Typed errors - all possible failures from lstat
// =============================================================================

export class FileNotFound extends Data.TaggedError("FileNotFound")<{
  readonly path: string
}> {}

export class FilePermissionDenied extends Data.TaggedError("FilePermissionDenied")<{
  readonly path: string
}> {}

export class FileStatUnknownError extends Data.TaggedError("FileStatUnknownError")<{
  readonly path: string
  readonly cause: string
}> {}

export type FileStatError = FileNotFound | FilePermissionDenied | FileStatUnknownError

// =============================================================================
// Service interface
// =============================================================================

/** The raw status fields a snapshot needs. `mode` includes the type bits. */
export interface RawStatus {
  readonly mode: number
  readonly uid: number
  readonly gid: number
}

export interface FileStatService {
  readonly lstat: (path: string) => Effect.Effect<RawStatus, FileStatError>
}

export class FileStatServiceTag extends Context.Tag("FileStatService")<
  FileStatServiceTag,
  FileStatService
>() {}

// =============================================================================
// Error detection
// =============================================================================

export const toFileStatError = (path: string, error: unknown): FileStatError => {
  const { kind, message } = classifyIoError(error)

  switch (kind) {
    // A path component replaced by a file reads as ENOTDIR: the path is gone
    case "not_found":
    case "not_a_directory":
      return new FileNotFound({ path })
    case "permission_denied":
      return new FilePermissionDenied({ path })
    case "unknown":
      return new FileStatUnknownError({ path, cause: message })
  }
}

// =============================================================================
// Live implementation (node:fs/promises)
// =============================================================================

export const FileStatServiceLive = Layer.succeed(FileStatServiceTag, {
  lstat: (path: string) =>
    pipe(
      Effect.tryPromise({
        try: () => lstat(path),
        catch: (e) => toFileStatError(path, e),
      }),
      Effect.map((s) => ({ mode: s.mode, uid: s.uid, gid: s.gid }))
    ),
})
