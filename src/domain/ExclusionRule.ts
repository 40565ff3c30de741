/**
 * Exclusion rules supplied by the caller.
 *
 * Directories and files are matched differently:
 *
 * - a directory is excluded when the rule's path components, counted with
 *   multiplicity, all occur in the directory's components. Order and position
 *   are ignored, so "/a/b" excludes both "/a/b/c" and "/a/c/b".
 * - a file is excluded only when its full path equals a rule verbatim.
 *
 * Neither is a prefix match.
 */

import { pathComponents } from "../lib/paths"

type ComponentCounts = ReadonlyMap<string, number>

export interface ExclusionRule {
  /** The rule as given, used for exact file matching */
  readonly raw: string
  readonly components: ComponentCounts
}

export interface ExclusionSet {
  readonly rules: ReadonlyArray<ExclusionRule>
  readonly exactPaths: ReadonlySet<string>
}

export const countComponents = (path: string): ComponentCounts => {
  const counts = new Map<string, number>()
  for (const component of pathComponents(path)) {
    counts.set(component, (counts.get(component) ?? 0) + 1)
  }
  return counts
}

/** True when every component of `subset` occurs in `superset` at least as often. */
export const containsComponents = (superset: ComponentCounts, subset: ComponentCounts): boolean =>
  Array.from(subset).every(([component, count]) => (superset.get(component) ?? 0) >= count)

/**
 * Blank rules (and rules naming only "/") carry no components and would match
 * every directory, so they are dropped.
 */
export const compileExclusions = (rules: ReadonlyArray<string>): ExclusionSet => {
  const usable = rules.filter((rule) => rule.trim().length > 0)
  return {
    rules: usable
      .map((raw) => ({ raw, components: countComponents(raw) }))
      .filter((rule) => rule.components.size > 0),
    exactPaths: new Set(usable),
  }
}

export const isDirectoryExcluded = (directoryPath: string, exclusions: ExclusionSet): boolean => {
  if (exclusions.rules.length === 0) return false
  const counts = countComponents(directoryPath)
  return exclusions.rules.some((rule) => containsComponents(counts, rule.components))
}

export const isFileExcluded = (
  filePath: string,
  fileName: string,
  exclusions: ExclusionSet,
  byproductSuffixes: ReadonlyArray<string>
): boolean =>
  exclusions.exactPaths.has(filePath) ||
  byproductSuffixes.some((suffix) => fileName.endsWith(suffix))
