/**
 * Path helpers for snapshot keys. Separator is always "/".
 */

export const SEPARATOR = "/"

export const stripTrailingSeparators = (path: string): string => {
  const stripped = path.replace(/\/+$/, "")
  return stripped === "" && path.startsWith(SEPARATOR) ? SEPARATOR : stripped
}

export const stripLeadingSeparators = (path: string): string => path.replace(/^\/+/, "")

/** Collapse repeated separators and drop trailing ones. */
export const normalizePath = (path: string): string =>
  stripTrailingSeparators(path.replace(/\/{2,}/g, SEPARATOR))

export const joinPath = (dir: string, name: string): string =>
  dir.endsWith(SEPARATOR) ? `${dir}${name}` : `${dir}${SEPARATOR}${name}`

/** Non-empty separator-delimited components, without leading or trailing separators. */
export const pathComponents = (path: string): string[] => {
  const trimmed = stripLeadingSeparators(normalizePath(path))
  return trimmed === "" ? [] : trimmed.split(SEPARATOR)
}

/**
 * Code-point order, independent of locale. Differs from `<` on strings only
 * for characters outside the Basic Multilingual Plane, which `<` compares by
 * their surrogate halves.
 */
export const comparePaths = (a: string, b: string): number => {
  const length = Math.min(a.length, b.length)
  for (let i = 0; i < length; i++) {
    const x = a.codePointAt(i) ?? 0
    const y = b.codePointAt(i) ?? 0
    if (x !== y) return x - y
  }
  return a.length - b.length
}
