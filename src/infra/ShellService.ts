/**
 * ShellService - wraps external command execution for testability.
 */

import { spawn } from "node:child_process"
import { Context, Data, Effect, Layer } from "effect"
import { classifyIoError } from "./ioError"

// =============================================================================
// Errors
// =============================================================================

export class ShellError extends Data.TaggedError("ShellError")<{
  readonly message: string
  readonly command: string
}> {}

// =============================================================================
// Types
// =============================================================================

export interface ShellResult {
  readonly stdout: string
  readonly stderr: string
  readonly exitCode: number
}

// =============================================================================
// Service interface
// =============================================================================

export interface ShellService {
  /** Runs `command` directly (no shell). A non-zero exit is a result, not an error. */
  readonly exec: (command: string, args: ReadonlyArray<string>) => Effect.Effect<ShellResult, ShellError>
}

export class ShellServiceTag extends Context.Tag("ShellService")<
  ShellServiceTag,
  ShellService
>() {}

// =============================================================================
// Live implementation (node:child_process)
// =============================================================================

const run = (command: string, args: ReadonlyArray<string>) =>
  new Promise<ShellResult>((resolve, reject) => {
    const proc = spawn(command, args, { stdio: ["ignore", "pipe", "pipe"] })
    let stdout = ""
    let stderr = ""

    proc.stdout.setEncoding("utf8").on("data", (chunk: string) => {
      stdout += chunk
    })
    proc.stderr.setEncoding("utf8").on("data", (chunk: string) => {
      stderr += chunk
    })
    proc.once("error", reject)
    proc.once("close", (code) => resolve({ stdout, stderr, exitCode: code ?? -1 }))
  })

export const ShellServiceLive = Layer.succeed(ShellServiceTag, {
  exec: (command, args) =>
    Effect.tryPromise({
      try: () => run(command, args),
      catch: (e) =>
        new ShellError({ message: `Shell command failed: ${classifyIoError(e).message}`, command }),
    }),
})
