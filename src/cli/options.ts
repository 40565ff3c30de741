import { Options } from "@effect/cli";

export const OPERATING_SYSTEMS = ["linux", "windows", "redhat", "debian"] as const;

export type OperatingSystem = (typeof OPERATING_SYSTEMS)[number];

export const path = Options.text("path").pipe(
  Options.withAlias("p"),
  Options.withDescription("Root directory to snapshot (e.g., /var/lib/agent)")
);

export const os = Options.choice("os", OPERATING_SYSTEMS).pipe(
  Options.withAlias("o"),
  Options.withDescription("Operating system or host distribution; names the output <os>_files.json")
);

export const ignore = Options.text("ignore").pipe(
  Options.withAlias("i"),
  Options.withDescription("Paths to ignore (comma-separated, e.g., '/var/lib/agent/logs,/home')"),
  Options.optional
);

export const noShowIgnoreList = Options.boolean("no-show-ignore-list").pipe(
  Options.withAlias("n"),
  Options.withDescription("Do not print the ignored paths after the snapshot"),
  Options.withDefault(false)
);

export const output = Options.file("output").pipe(
  Options.withDescription("Write the snapshot here instead of <os>_files.json"),
  Options.optional
);

export const concurrency = Options.integer("concurrency").pipe(
  Options.withDescription("Sibling directories walked in parallel (default: 1)"),
  Options.withDefault(1)
);

export const includeRoot = Options.boolean("include-root").pipe(
  Options.withDescription("Also record the root directory itself"),
  Options.withDefault(false)
);

export const debug = Options.boolean("debug").pipe(
  Options.withDescription("Enable verbose debug logging"),
  Options.withDefault(false)
);

export interface SnapshotOptions {
  readonly path: string;
  readonly os: OperatingSystem;
  readonly ignore: string | undefined;
  readonly noShowIgnoreList: boolean;
  readonly output: string | undefined;
  readonly concurrency: number;
  readonly includeRoot: boolean;
  readonly debug?: boolean;
}
