/**
 * Domain type for one inspected filesystem object.
 */

/** Placeholder for every field that could not be resolved. */
export const SENTINEL = "-"

export type Sentinel = typeof SENTINEL

export type EntryKind = "file" | "directory"

export interface ResolvedEntry {
  readonly _tag: "Resolved"
  /** Absolute, normalized path - unique within a snapshot */
  readonly path: string
  readonly kind: EntryKind
  readonly owner: string
  readonly group: string
  /** Last three octal digits of the permission bits, e.g. "750" */
  readonly modeOctal: string
  /** ls-style rendering, e.g. "drwxr-x---" */
  readonly modeSymbolic: string
}

/**
 * The path vanished before it could be inspected, or its owner/group could
 * not be named. Every descriptive field is the sentinel.
 */
export interface UnavailableEntry {
  readonly _tag: "Unavailable"
  readonly path: string
  readonly kind: "unknown"
  readonly owner: Sentinel
  readonly group: Sentinel
  readonly modeOctal: Sentinel
  readonly modeSymbolic: Sentinel
}

export type FileSystemEntry = ResolvedEntry | UnavailableEntry

export const resolvedEntry = (fields: Omit<ResolvedEntry, "_tag">): FileSystemEntry => ({
  _tag: "Resolved",
  ...fields,
})

export const unavailableEntry = (path: string): FileSystemEntry => ({
  _tag: "Unavailable",
  path,
  kind: "unknown",
  owner: SENTINEL,
  group: SENTINEL,
  modeOctal: SENTINEL,
  modeSymbolic: SENTINEL,
})

export const isUnavailable = (entry: FileSystemEntry): entry is UnavailableEntry =>
  entry._tag === "Unavailable"
