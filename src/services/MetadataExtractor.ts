/**
 * MetadataExtractor - inspects one path and resolves it into a FileSystemEntry.
 *
 * A vanished path or an owner/group without a name is a normal outcome: the
 * entry comes back fully unavailable. Only failures to read the status at all
 * surface as errors, and callers drop those paths from the snapshot.
 */

import { Context, Data, Effect, Layer, pipe } from "effect"
import { FileStatServiceTag, type RawStatus } from "../infra/FileStatService"
import { AccountServiceTag } from "../infra/AccountService"
import {
  resolvedEntry,
  unavailableEntry,
  type FileSystemEntry,
} from "../domain/FileSystemEntry"
import { formatModeOctal, formatModeSymbolic, isDirectoryMode } from "../lib/fileMode"

// =============================================================================
// Service errors
// =============================================================================

export class InspectPermissionDenied extends Data.TaggedError("InspectPermissionDenied")<{
  readonly path: string
}> {}

export class InspectFailed extends Data.TaggedError("InspectFailed")<{
  readonly path: string
  readonly reason: string
}> {}

export type InspectError = InspectPermissionDenied | InspectFailed

// =============================================================================
// Service interface
// =============================================================================

export interface MetadataExtractor {
  readonly extract: (path: string) => Effect.Effect<FileSystemEntry, InspectError>
}

export class MetadataExtractorTag extends Context.Tag("MetadataExtractor")<
  MetadataExtractorTag,
  MetadataExtractor
>() {}

// =============================================================================
// Implementation
// =============================================================================

export const MetadataExtractorLive = Layer.effect(
  MetadataExtractorTag,
  Effect.gen(function* () {
    const fileStat = yield* FileStatServiceTag
    const accounts = yield* AccountServiceTag

    const describe = (path: string, status: RawStatus) =>
      pipe(
        Effect.all({
          owner: accounts.userName(status.uid),
          group: accounts.groupName(status.gid),
        }),
        Effect.map(({ owner, group }) =>
          resolvedEntry({
            path,
            kind: isDirectoryMode(status.mode) ? "directory" : "file",
            owner,
            group,
            modeOctal: formatModeOctal(status.mode),
            modeSymbolic: formatModeSymbolic(status.mode),
          })
        )
      )

    const extract: MetadataExtractor["extract"] = (path) =>
      pipe(
        fileStat.lstat(path),
        Effect.flatMap((status) => describe(path, status)),
        Effect.catchTags({
          FileNotFound: () =>
            pipe(
              Effect.logDebug(`Vanished before inspection: ${path}`),
              Effect.as(unavailableEntry(path))
            ),
          AccountNotFound: (e) =>
            pipe(
              Effect.logDebug(`No ${e.database} name for id ${e.id}: ${path}`),
              Effect.as(unavailableEntry(path))
            ),
          FilePermissionDenied: () => Effect.fail(new InspectPermissionDenied({ path })),
          FileStatUnknownError: (e) => Effect.fail(new InspectFailed({ path, reason: e.cause })),
        })
      )

    return { extract }
  })
)
