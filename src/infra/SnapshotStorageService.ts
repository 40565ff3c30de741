/**
 * SnapshotStorageService - writes the snapshot document to disk.
 */

import { Context, Data, Effect, Layer, Match, pipe } from "effect"
import { FileSystem } from "@effect/platform"
import { serializeSnapshotDocument, type SnapshotDocument } from "../domain/Snapshot"
import { classifyIoError, type ClassifiedIoError } from "./ioError"

// =============================================================================
// Service errors - all possible failure modes
// =============================================================================

export class SnapshotPermissionDenied extends Data.TaggedError("SnapshotPermissionDenied")<{
  readonly path: string
}> {}

export class SnapshotSaveFailed extends Data.TaggedError("SnapshotSaveFailed")<{
  readonly path: string
  readonly reason: string
}> {}

export type SnapshotStorageError = SnapshotPermissionDenied | SnapshotSaveFailed

const matchSaveError = (path: string) =>
  Match.type<ClassifiedIoError>().pipe(
    Match.when({ kind: "permission_denied" }, () => new SnapshotPermissionDenied({ path })),
    Match.orElse(({ message }) => new SnapshotSaveFailed({ path, reason: message }))
  )

// =============================================================================
// Service interface
// =============================================================================

export interface SnapshotStorageService {
  /** Overwrites `path` with the serialized document */
  readonly save: (document: SnapshotDocument, path: string) => Effect.Effect<void, SnapshotStorageError>
}

export class SnapshotStorageServiceTag extends Context.Tag("SnapshotStorageService")<
  SnapshotStorageServiceTag,
  SnapshotStorageService
>() {}

/** `<os>_files.json` in the working directory */
export const defaultSnapshotPath = (os: string): string => `${os}_files.json`

// =============================================================================
// Implementation
// =============================================================================

export const SnapshotStorageServiceLive = Layer.effect(
  SnapshotStorageServiceTag,
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem

    const save: SnapshotStorageService["save"] = (document, path) =>
      pipe(
        fs.writeFileString(path, serializeSnapshotDocument(document)),
        Effect.mapError((e) => matchSaveError(path)(classifyIoError(e))),
        Effect.tap(() => Effect.logDebug(`Wrote ${document.data.length} records to ${path}`))
      )

    return { save }
  })
)
