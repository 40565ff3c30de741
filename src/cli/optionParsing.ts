import { defaultSnapshotPath } from "../infra/SnapshotStorageService";
import { DEFAULT_BYPRODUCT_SUFFIXES, type WalkOptions } from "../services/TreeWalker";
import type { SnapshotOptions } from "./options";

export const splitCommaSeparated = (value: string | undefined): string[] =>
  value
    ? value
        .split(",")
        .map((s) => s.trim())
        .filter((s) => s.length > 0)
    : [];

export interface ParsedSnapshotOptions {
  readonly root: string;
  readonly ignoreRules: string[];
  readonly outputPath: string;
  readonly walk: WalkOptions;
}

export const parseSnapshotOptions = (options: SnapshotOptions): ParsedSnapshotOptions => {
  const ignoreRules = splitCommaSeparated(options.ignore);

  return {
    root: options.path,
    ignoreRules,
    outputPath: options.output ?? defaultSnapshotPath(options.os),
    walk: {
      exclusions: ignoreRules,
      byproductSuffixes: DEFAULT_BYPRODUCT_SUFFIXES,
      concurrency: Math.max(1, options.concurrency),
      includeRoot: options.includeRoot
    }
  };
};
