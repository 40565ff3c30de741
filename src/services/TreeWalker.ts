/**
 * TreeWalker - depth-first traversal that builds a Snapshot.
 *
 * The root is the starting point, not an entry, unless `includeRoot` is set.
 * Exclusions are tested before a directory is listed, so excluded subtrees
 * are never enumerated. Symbolic links below the root are recorded but never
 * descended; a root given as a link to a directory is walked under the
 * path the caller gave.
 * Per-path failures below the root are recorded in `Snapshot.skipped` and the
 * walk continues; only an unusable root fails the walk.
 */

import { resolve } from "node:path"
import { Context, Data, Effect, Layer, Match, pipe } from "effect"
import { DirectoryServiceTag, type DirectoryEntry, type DirectoryError } from "../infra/DirectoryService"
import { FileStatServiceTag, type FileStatError } from "../infra/FileStatService"
import { MetadataExtractorTag, type InspectError } from "./MetadataExtractor"
import {
  compileExclusions,
  isDirectoryExcluded,
  isFileExcluded,
  type ExclusionSet,
} from "../domain/ExclusionRule"
import {
  buildSnapshot,
  emptyPartition,
  mergePartitions,
  type SkippedPath,
  type Snapshot,
  type SnapshotPartition,
} from "../domain/Snapshot"
import { isDirectoryMode, isSymlinkMode } from "../lib/fileMode"
import { joinPath, normalizePath } from "../lib/paths"

// =============================================================================
// Service errors - the root cannot be walked at all
// =============================================================================

export class WalkRootNotFound extends Data.TaggedError("WalkRootNotFound")<{
  readonly path: string
}> {}

export class WalkRootNotADirectory extends Data.TaggedError("WalkRootNotADirectory")<{
  readonly path: string
}> {}

export class WalkRootPermissionDenied extends Data.TaggedError("WalkRootPermissionDenied")<{
  readonly path: string
}> {}

export class WalkRootFailed extends Data.TaggedError("WalkRootFailed")<{
  readonly path: string
  readonly reason: string
}> {}

export type WalkError =
  | WalkRootNotFound
  | WalkRootNotADirectory
  | WalkRootPermissionDenied
  | WalkRootFailed

const fromRootStatError = (path: string) =>
  Match.typeTags<FileStatError>()({
    FileNotFound: () => new WalkRootNotFound({ path }),
    FilePermissionDenied: () => new WalkRootPermissionDenied({ path }),
    FileStatUnknownError: (e) => new WalkRootFailed({ path, reason: e.cause }),
  })

const fromRootListError = (path: string) =>
  Match.typeTags<DirectoryError>()({
    DirectoryNotFound: () => new WalkRootNotFound({ path }),
    DirectoryPermissionDenied: () => new WalkRootPermissionDenied({ path }),
    NotADirectory: () => new WalkRootNotADirectory({ path }),
    DirectoryUnknownError: (e) => new WalkRootFailed({ path, reason: e.cause }),
  })

const skippedFromInspectError = Match.typeTags<InspectError>()({
  InspectPermissionDenied: (e): SkippedPath => ({ path: e.path, reason: "permission-denied" }),
  InspectFailed: (e): SkippedPath => ({ path: e.path, reason: "inspect-failed", detail: e.reason }),
})

// =============================================================================
// Service interface
// =============================================================================

/** Suffixes of files the tool's own build leaves behind */
export const DEFAULT_BYPRODUCT_SUFFIXES: ReadonlyArray<string> = [".tsbuildinfo"]

export interface WalkOptions {
  readonly exclusions?: ReadonlyArray<string>
  readonly byproductSuffixes?: ReadonlyArray<string>
  /** Sibling subtrees walked in parallel (default 1) */
  readonly concurrency?: number
  /** Record the root directory itself (default: descendants only) */
  readonly includeRoot?: boolean
}

export interface TreeWalker {
  readonly walk: (root: string, options?: WalkOptions) => Effect.Effect<Snapshot, WalkError>
}

export class TreeWalkerTag extends Context.Tag("TreeWalker")<TreeWalkerTag, TreeWalker>() {}

// =============================================================================
// Implementation
// =============================================================================

interface WalkContext {
  readonly exclusions: ExclusionSet
  readonly byproductSuffixes: ReadonlyArray<string>
  readonly concurrency: number
  readonly withIo: <A, E, R>(effect: Effect.Effect<A, E, R>) => Effect.Effect<A, E, R>
}

export const TreeWalkerLive = Layer.effect(
  TreeWalkerTag,
  Effect.gen(function* () {
    const directories = yield* DirectoryServiceTag
    const fileStat = yield* FileStatServiceTag
    const extractor = yield* MetadataExtractorTag

    const inspect = (ctx: WalkContext, path: string): Effect.Effect<SnapshotPartition> =>
      pipe(
        ctx.withIo(extractor.extract(path)),
        Effect.map((entry): SnapshotPartition => ({ entries: [entry], skipped: [] })),
        Effect.catchAll((e) => {
          const skipped = skippedFromInspectError(e)
          return pipe(
            Effect.logWarning(`Skipping ${skipped.path}: ${skipped.reason}`),
            Effect.as<SnapshotPartition>({ entries: [], skipped: [skipped] })
          )
        })
      )

    const unreadable = (path: string, error: DirectoryError): Effect.Effect<SnapshotPartition> => {
      const detail = error._tag === "DirectoryUnknownError" ? error.cause : error._tag
      return pipe(
        Effect.logWarning(`Cannot list ${path}: ${detail}`),
        Effect.as<SnapshotPartition>({
          entries: [],
          skipped: [{ path, reason: "unreadable-directory", detail }],
        })
      )
    }

    const visitChildren = (
      ctx: WalkContext,
      dirPath: string,
      listing: ReadonlyArray<DirectoryEntry>
    ): Effect.Effect<SnapshotPartition> =>
      Effect.gen(function* () {
        const files = listing
          .filter((entry) => !entry.isDirectory)
          .map((entry) => ({ path: joinPath(dirPath, entry.name), name: entry.name }))
          .filter((file) => !isFileExcluded(file.path, file.name, ctx.exclusions, ctx.byproductSuffixes))

        const filePartitions = yield* Effect.forEach(files, (file) => inspect(ctx, file.path))

        const subdirectoryPartitions = yield* Effect.forEach(
          listing.filter((entry) => entry.isDirectory),
          (entry) => visitDirectory(ctx, joinPath(dirPath, entry.name)),
          { concurrency: ctx.concurrency }
        )

        return mergePartitions([...filePartitions, ...subdirectoryPartitions])
      })

    const visitDirectory = (ctx: WalkContext, dirPath: string): Effect.Effect<SnapshotPartition> =>
      Effect.gen(function* () {
        if (isDirectoryExcluded(dirPath, ctx.exclusions)) {
          yield* Effect.logDebug(`Excluded directory: ${dirPath}`)
          return emptyPartition
        }

        const self = yield* inspect(ctx, dirPath)
        const children = yield* pipe(
          ctx.withIo(directories.list(dirPath)),
          Effect.matchEffect({
            onFailure: (e) => unreadable(dirPath, e),
            onSuccess: (listing) => visitChildren(ctx, dirPath, listing),
          })
        )

        return mergePartitions([self, children])
      })

    const checkRoot = (rootPath: string): Effect.Effect<ReadonlyArray<DirectoryEntry>, WalkError> =>
      Effect.gen(function* () {
        const status = yield* pipe(fileStat.lstat(rootPath), Effect.mapError(fromRootStatError(rootPath)))
        // A linked root is listed through its link; the listing decides what it points at
        if (!isDirectoryMode(status.mode) && !isSymlinkMode(status.mode)) {
          return yield* Effect.fail(new WalkRootNotADirectory({ path: rootPath }))
        }
        return yield* pipe(directories.list(rootPath), Effect.mapError(fromRootListError(rootPath)))
      })

    const walk: TreeWalker["walk"] = (root, options = {}) =>
      Effect.gen(function* () {
        const rootPath = normalizePath(resolve(root))
        const concurrency = Math.max(1, options.concurrency ?? 1)
        const permits = yield* Effect.makeSemaphore(concurrency)

        const ctx: WalkContext = {
          exclusions: compileExclusions(options.exclusions ?? []),
          byproductSuffixes: options.byproductSuffixes ?? DEFAULT_BYPRODUCT_SUFFIXES,
          concurrency,
          withIo: permits.withPermits(1),
        }

        yield* Effect.logDebug(
          `Walking ${rootPath} (${ctx.exclusions.rules.length} exclusion rules, concurrency ${concurrency})`
        )

        const rootListing = yield* checkRoot(rootPath)

        if (isDirectoryExcluded(rootPath, ctx.exclusions)) {
          yield* Effect.logDebug(`Root itself is excluded: ${rootPath}`)
          return buildSnapshot(rootPath, emptyPartition)
        }

        const self = options.includeRoot ? yield* inspect(ctx, rootPath) : emptyPartition
        const children = yield* visitChildren(ctx, rootPath, rootListing)

        return buildSnapshot(rootPath, mergePartitions([self, children]))
      })

    return { walk }
  })
)
