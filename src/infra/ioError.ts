/**
 * Classify errors thrown by node:fs and @effect/platform.
 *
 * Checks `code` first, then falls back to message parsing for wrapped
 * errors (e.g. @effect/platform SystemError carries the reason in its message).
 */

export type IoErrorKind = "not_found" | "permission_denied" | "not_a_directory" | "unknown"

export interface ClassifiedIoError {
  readonly kind: IoErrorKind
  readonly message: string
}

const readStringField = (error: unknown, field: "code" | "message" | "reason"): string | undefined => {
  if (typeof error !== "object" || error === null || !(field in error)) return undefined
  const value: unknown = Reflect.get(error, field)
  return typeof value === "string" ? value : undefined
}

const kindFromCode = (code: string | undefined): IoErrorKind | undefined => {
  switch (code?.toUpperCase()) {
    case "ENOENT":
    case "NOTFOUND":
      return "not_found"
    case "EACCES":
    case "EPERM":
    case "PERMISSIONDENIED":
      return "permission_denied"
    case "ENOTDIR":
      return "not_a_directory"
    default:
      return undefined
  }
}

const kindFromMessage = (message: string): IoErrorKind => {
  const lower = message.toLowerCase()
  if (lower.includes("enoent") || lower.includes("no such file")) return "not_found"
  if (
    lower.includes("eacces") ||
    lower.includes("permission denied") ||
    lower.includes("eperm") ||
    lower.includes("operation not permitted")
  ) {
    return "permission_denied"
  }
  if (lower.includes("enotdir") || lower.includes("not a directory")) return "not_a_directory"
  return "unknown"
}

export const classifyIoError = (error: unknown): ClassifiedIoError => {
  const message = readStringField(error, "message") ?? String(error)
  const kind =
    kindFromCode(readStringField(error, "code")) ??
    kindFromCode(readStringField(error, "reason")) ??
    kindFromMessage(message)
  return { kind, message }
}
