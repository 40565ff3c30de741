/**
 * LoggerService - formatted console output for the snapshot command
 */

import { Context, Effect, Layer, Console } from "effect"
import type { SkippedPath, SnapshotSummary } from "../domain/Snapshot"

// =============================================================================
// Service interface
// =============================================================================

export interface SnapshotArguments {
  readonly path: string
  readonly os: string
  readonly ignore: ReadonlyArray<string>
  readonly output: string
  readonly concurrency: number
  readonly includeRoot: boolean
}

export interface LoggerService {
  readonly header: (args: SnapshotArguments) => Effect.Effect<void>
  readonly checkingFiles: Effect.Effect<void>
  readonly summary: (summary: SnapshotSummary) => Effect.Effect<void>
  readonly skippedPaths: (skipped: ReadonlyArray<SkippedPath>) => Effect.Effect<void>
  readonly ignoredList: (rules: ReadonlyArray<string>) => Effect.Effect<void>
  readonly saved: (path: string, records: number) => Effect.Effect<void>
  readonly done: Effect.Effect<void>
}

export class LoggerServiceTag extends Context.Tag("LoggerService")<
  LoggerServiceTag,
  LoggerService
>() {}

/** Sorted, de-duplicated rules as printed under "Ignored:" */
export const ignoredListLines = (rules: ReadonlyArray<string>): string[] =>
  Array.from(new Set(rules)).sort()

const describeSkipped = (skipped: SkippedPath): string =>
  skipped.detail ? `${skipped.path} (${skipped.reason}: ${skipped.detail})` : `${skipped.path} (${skipped.reason})`

// =============================================================================
// Implementation
// =============================================================================

export const LoggerServiceLive = Layer.succeed(
  LoggerServiceTag,
  {
    header: (args) =>
      Effect.gen(function* () {
        yield* Console.log("\n🔐 Permission Snapshot\n")
        yield* Console.log(`   Path: ${args.path}`)
        yield* Console.log(`   OS: ${args.os}`)
        yield* Console.log(`   Output: ${args.output}`)
        if (args.ignore.length > 0) yield* Console.log(`   Ignore: ${args.ignore.join(",")}`)
        if (args.concurrency > 1) yield* Console.log(`   Concurrency: ${args.concurrency}`)
        if (args.includeRoot) yield* Console.log(`   Including root directory`)
      }),
    checkingFiles: Console.log("\n🔍 Checking files..."),
    summary: (summary) =>
      Effect.gen(function* () {
        yield* Console.log(`\n📊 Snapshot Summary:`)
        yield* Console.log(`   Directories: ${summary.directories}`)
        yield* Console.log(`   Files: ${summary.files}`)
        if (summary.unavailable > 0) yield* Console.log(`   Unavailable: ${summary.unavailable}`)
        if (summary.skipped > 0) yield* Console.log(`   Skipped: ${summary.skipped}`)
      }),
    skippedPaths: (skipped) =>
      skipped.length === 0
        ? Effect.void
        : Effect.gen(function* () {
            yield* Console.log(`\n⚠️  Skipped ${skipped.length} path(s):`)
            yield* Effect.forEach(skipped, (s) => Console.log(`   ${describeSkipped(s)}`), { discard: true })
          }),
    ignoredList: (rules) =>
      rules.length === 0
        ? Effect.void
        : Effect.gen(function* () {
            yield* Console.log("\nIgnored:")
            yield* Effect.forEach(ignoredListLines(rules), (line) => Console.log(line), { discard: true })
          }),
    saved: (path, records) => Console.log(`\n💾 Saved ${records} records to ${path}`),
    done: Console.log("✓ Snapshot complete\n"),
  }
)
