/**
 * Snapshot - every entry produced by one traversal, keyed by path, plus the
 * paths the traversal had to leave out.
 */

import { SENTINEL, isUnavailable, type FileSystemEntry } from "./FileSystemEntry"
import { comparePaths } from "../lib/paths"

export type SkipReason = "permission-denied" | "inspect-failed" | "unreadable-directory"

export interface SkippedPath {
  readonly path: string
  readonly reason: SkipReason
  readonly detail?: string
}

export interface Snapshot {
  readonly root: string
  readonly entries: ReadonlyMap<string, FileSystemEntry>
  readonly skipped: ReadonlyArray<SkippedPath>
}

/**
 * What one directory visit contributes. Visits never share state; the walker
 * concatenates partitions in listing order.
 */
export interface SnapshotPartition {
  readonly entries: ReadonlyArray<FileSystemEntry>
  readonly skipped: ReadonlyArray<SkippedPath>
}

export const emptyPartition: SnapshotPartition = { entries: [], skipped: [] }

export const mergePartitions = (partitions: ReadonlyArray<SnapshotPartition>): SnapshotPartition => ({
  entries: partitions.flatMap((p) => p.entries),
  skipped: partitions.flatMap((p) => p.skipped),
})

export const buildSnapshot = (root: string, partition: SnapshotPartition): Snapshot => ({
  root,
  entries: new Map(partition.entries.map((entry) => [entry.path, entry])),
  skipped: partition.skipped,
})

export const sortedPaths = (snapshot: Snapshot): string[] =>
  Array.from(snapshot.entries.keys()).sort(comparePaths)

export interface SnapshotSummary {
  readonly directories: number
  readonly files: number
  readonly unavailable: number
  readonly skipped: number
}

export const summarizeSnapshot = (snapshot: Snapshot): SnapshotSummary => {
  const entries = Array.from(snapshot.entries.values())
  return {
    directories: entries.filter((e) => e.kind === "directory").length,
    files: entries.filter((e) => e.kind === "file").length,
    unavailable: entries.filter(isUnavailable).length,
    skipped: snapshot.skipped.length,
  }
}

// =============================================================================
// Persisted document
// =============================================================================

export interface SnapshotRecordDescription {
  readonly group: string
  readonly mode: string
  readonly prot: string
  readonly type: string
  readonly user: string
}

export interface SnapshotRecord {
  readonly id: number
  readonly name: string
  readonly description: SnapshotRecordDescription
}

/**
 * Document format diffed against install baselines. Records are ordered by
 * ascending path and numbered from zero in that order.
 */
export interface SnapshotDocument {
  readonly data: ReadonlyArray<SnapshotRecord>
}

const describeEntry = (entry: FileSystemEntry): SnapshotRecordDescription => ({
  group: entry.group,
  mode: entry.modeOctal,
  prot: entry.modeSymbolic,
  type: entry.kind === "unknown" ? SENTINEL : entry.kind,
  user: entry.owner,
})

export const toSnapshotDocument = (snapshot: Snapshot): SnapshotDocument => ({
  data: sortedPaths(snapshot).flatMap((path, id) => {
    const entry = snapshot.entries.get(path)
    return entry ? [{ id, name: path, description: describeEntry(entry) }] : []
  }),
})

export const serializeSnapshotDocument = (document: SnapshotDocument): string =>
  JSON.stringify(document)
