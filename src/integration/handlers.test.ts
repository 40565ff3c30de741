/**
 * Integration tests for CLI handlers using TestContext.
 *
 * Uses a virtual filesystem to verify orchestration logic
 * by checking what the edge services are called with.
 */

import { afterEach, beforeEach, describe, expect, test } from "vitest"
import { Effect, Layer, Logger, LogLevel, pipe } from "effect"

import { runSnapshot, withErrorHandling } from "../cli/handler"
import type { SnapshotOptions } from "../cli/options"
import { createTestContext, type TestContext } from "../test/TestContext"
import { MetadataExtractorLive } from "../services/MetadataExtractor"
import { TreeWalkerLive } from "../services/TreeWalker"
import { LoggerServiceLive } from "../services/LoggerService"
import { SnapshotStorageServiceLive } from "../infra/SnapshotStorageService"

/**
 * Build the full test layer by:
 * 1. Start with mocked infra layer (ctx.layer)
 * 2. Build service layers on top that depend on infra
 */
function buildTestLayer(ctx: TestContext) {
  const TreeWalkerWithDeps = pipe(
    TreeWalkerLive,
    Layer.provide(MetadataExtractorLive),
    Layer.provide(ctx.layer)
  )
  const StorageWithDeps = pipe(SnapshotStorageServiceLive, Layer.provide(ctx.layer))

  return Layer.mergeAll(LoggerServiceLive, TreeWalkerWithDeps, StorageWithDeps)
}

const baseOptions: SnapshotOptions = {
  path: "/tmp/demo",
  os: "linux",
  ignore: undefined,
  noShowIgnoreList: false,
  output: undefined,
  concurrency: 1,
  includeRoot: false,
}

const run = (ctx: TestContext, options: Partial<SnapshotOptions> = {}) =>
  pipe(
    runSnapshot({ ...baseOptions, ...options }),
    Effect.provide(buildTestLayer(ctx)),
    Effect.provide(Logger.minimumLogLevel(LogLevel.None)),
    Effect.runPromise
  )

const demoTree = () => {
  const ctx = createTestContext()
  ctx.addGroup(1000, "svc")
  ctx.addDirectory("/tmp/demo")
  ctx.addDirectory("/tmp/demo/bin", { mode: 0o750, gid: 1000 })
  ctx.addFile("/tmp/demo/bin/run.sh", { mode: 0o644 })
  return ctx
}

// =============================================================================
// Tests: runSnapshot
// =============================================================================

describe("runSnapshot", () => {
  test("writes the document to <os>_files.json", async () => {
    const ctx = demoTree()

    await run(ctx)

    expect(ctx.calls.writeFile).toEqual(["linux_files.json"])
    expect(ctx.writes.get("linux_files.json")).toBe(
      '{"data":[' +
        '{"id":0,"name":"/tmp/demo/bin","description":{"group":"svc","mode":"750","prot":"drwxr-x---","type":"directory","user":"root"}},' +
        '{"id":1,"name":"/tmp/demo/bin/run.sh","description":{"group":"root","mode":"644","prot":"-rw-r--r--","type":"file","user":"root"}}' +
        "]}"
    )
  })

  test("honours an explicit output path", async () => {
    const ctx = demoTree()

    await run(ctx, { os: "debian", output: "/tmp/out/baseline.json" })

    expect(ctx.calls.writeFile).toEqual(["/tmp/out/baseline.json"])
  })

  test("applies comma-separated ignore rules", async () => {
    const ctx = demoTree()

    const snapshot = await run(ctx, { ignore: " /tmp/demo/bin , " })

    expect(snapshot.entries.size).toBe(0)
    expect(ctx.writes.get("linux_files.json")).toBe('{"data":[]}')
  })

  test("records the root when asked", async () => {
    const ctx = demoTree()

    const snapshot = await run(ctx, { includeRoot: true })

    expect(snapshot.entries.has("/tmp/demo")).toBe(true)
  })

  test("writes unavailable entries with sentinel fields", async () => {
    const ctx = createTestContext()
    ctx.addDirectory("/srv")
    ctx.addFile("/srv/orphan", { uid: 4242 })

    await run(ctx, { path: "/srv" })

    expect(ctx.writes.get("linux_files.json")).toBe(
      '{"data":[{"id":0,"name":"/srv/orphan","description":{"group":"-","mode":"-","prot":"-","type":"-","user":"-"}}]}'
    )
  })
})

// =============================================================================
// Tests: withErrorHandling
// =============================================================================

describe("withErrorHandling", () => {
  beforeEach(() => {
    process.exitCode = undefined
  })

  afterEach(() => {
    process.exitCode = undefined
  })

  test("sets exit status 1 and writes nothing when the root is missing", async () => {
    const ctx = createTestContext()

    await pipe(
      withErrorHandling(runSnapshot({ ...baseOptions, path: "/nonexistent" })),
      Effect.provide(buildTestLayer(ctx)),
      Effect.provide(Logger.minimumLogLevel(LogLevel.None)),
      Effect.runPromise
    )

    expect(process.exitCode).toBe(1)
    expect(ctx.calls.writeFile).toEqual([])
  })

  test("leaves the exit status alone on success", async () => {
    const ctx = demoTree()

    await pipe(
      withErrorHandling(runSnapshot(baseOptions)),
      Effect.provide(buildTestLayer(ctx)),
      Effect.provide(Logger.minimumLogLevel(LogLevel.None)),
      Effect.runPromise
    )

    expect(process.exitCode).toBeUndefined()
    expect(ctx.calls.writeFile).toEqual(["linux_files.json"])
  })
})
