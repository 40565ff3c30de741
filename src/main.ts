#!/usr/bin/env node
/**
 * perm-snapshot CLI
 *
 * Records owner, group and permission bits of every file and directory under
 * a root, and writes them as a JSON document that can be diffed against a
 * known-good install.
 *
 * Example:
 *   $ perm-snapshot -p /var/lib/agent -o linux
 *   $ perm-snapshot -p /var/lib/agent -o debian -i '/var/lib/agent/logs,/var/lib/agent/tmp' -n
 */

import { Command } from "@effect/cli"
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect, Option, Logger, LogLevel } from "effect"

import * as Opts from "./cli/options"
import { runSnapshot, AppLive, withErrorHandling } from "./cli/handler"

// =============================================================================
// Snapshot command
// =============================================================================

const snapshotCommand = Command.make(
  "perm-snapshot",
  {
    path: Opts.path,
    os: Opts.os,
    ignore: Opts.ignore,
    noShowIgnoreList: Opts.noShowIgnoreList,
    output: Opts.output,
    concurrency: Opts.concurrency,
    includeRoot: Opts.includeRoot,
    debug: Opts.debug,
  },
  (opts) =>
    withErrorHandling(
      runSnapshot({
        path: opts.path,
        os: opts.os,
        ignore: Option.getOrUndefined(opts.ignore),
        noShowIgnoreList: opts.noShowIgnoreList,
        output: Option.getOrUndefined(opts.output),
        concurrency: opts.concurrency,
        includeRoot: opts.includeRoot,
        debug: opts.debug,
      })
    ).pipe(
      Effect.provide(Logger.minimumLogLevel(opts.debug ? LogLevel.Debug : LogLevel.Info)),
      Effect.provide(AppLive)
    )
).pipe(
  Command.withDescription(
    "Snapshot ownership and permissions of a directory tree"
  )
)

// =============================================================================
// Run CLI
// =============================================================================

const cli = Command.run(snapshotCommand, {
  name: "perm-snapshot",
  version: "0.1.0",
})

cli(process.argv).pipe(Effect.provide(NodeContext.layer), NodeRuntime.runMain)
