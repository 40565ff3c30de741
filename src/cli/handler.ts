import { Effect, Layer, pipe } from "effect"
import { Console } from "effect"

import type { SnapshotOptions } from "./options"
import { parseSnapshotOptions } from "./optionParsing"
import { fromDomainError, type DomainError } from "./errors"

import { toSnapshotDocument, summarizeSnapshot } from "../domain/Snapshot"
import { DirectoryServiceLive } from "../infra/DirectoryService"
import { FileStatServiceLive } from "../infra/FileStatService"
import { AccountServiceLive } from "../infra/AccountService"
import { ShellServiceLive } from "../infra/ShellService"
import { SnapshotStorageServiceLive, SnapshotStorageServiceTag } from "../infra/SnapshotStorageService"
import { MetadataExtractorLive } from "../services/MetadataExtractor"
import { TreeWalkerLive, TreeWalkerTag } from "../services/TreeWalker"
import { LoggerServiceLive, LoggerServiceTag } from "../services/LoggerService"

/**
 * Error handling wrapper for CLI commands. Fatal errors are printed and the
 * process exit status is set to 1.
 */
export const withErrorHandling = <A, R>(
  effect: Effect.Effect<A, DomainError, R>
): Effect.Effect<void, never, R> =>
  pipe(
    effect,
    Effect.catchAll((error) => {
      const appError = fromDomainError(error)
      return pipe(
        Console.error(`\n${appError.format()}`),
        Effect.zipRight(Effect.sync(() => {
          process.exitCode = 1
        }))
      )
    }),
    Effect.asVoid
  )

/**
 * Walk the root, save the document, report what happened.
 */
export const runSnapshot = (options: SnapshotOptions) =>
  Effect.gen(function* () {
    const walker = yield* TreeWalkerTag
    const storage = yield* SnapshotStorageServiceTag
    const logger = yield* LoggerServiceTag

    if (options.debug) {
      yield* Effect.logInfo("Debug logging enabled")
    }

    const parsed = parseSnapshotOptions(options)

    yield* logger.header({
      path: parsed.root,
      os: options.os,
      ignore: parsed.ignoreRules,
      output: parsed.outputPath,
      concurrency: options.concurrency,
      includeRoot: options.includeRoot,
    })
    yield* logger.checkingFiles

    const snapshot = yield* walker.walk(parsed.root, parsed.walk)

    yield* logger.summary(summarizeSnapshot(snapshot))
    yield* logger.skippedPaths(snapshot.skipped)

    const document = toSnapshotDocument(snapshot)
    yield* storage.save(document, parsed.outputPath)
    yield* logger.saved(parsed.outputPath, document.data.length)

    if (!options.noShowIgnoreList) {
      yield* logger.ignoredList(parsed.ignoreRules)
    }

    yield* logger.done

    return snapshot
  })

// =============================================================================
// Layer composition
// =============================================================================

const InfraLive = Layer.mergeAll(
  FileStatServiceLive,
  DirectoryServiceLive,
  pipe(AccountServiceLive, Layer.provide(ShellServiceLive))
)

/**
 * Every service the snapshot command needs. Requires the platform
 * FileSystem (NodeContext.layer in production).
 */
export const AppLive = pipe(
  Layer.mergeAll(TreeWalkerLive, SnapshotStorageServiceLive, LoggerServiceLive),
  Layer.provide(MetadataExtractorLive),
  Layer.provide(InfraLive)
)
