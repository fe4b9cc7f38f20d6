/**
 * SandboxDetector - finds the first available sandbox tool on PATH.
 *
 * Detection runs at most once per layer instance; the answer is cached for the
 * rest of the process.
 */
import { FileSystem } from "@effect/platform"
import { Context, Effect, Layer, Option } from "effect"
import { resolveExecutable } from "../toolchain.ts"
import { ADAPTERS } from "./adapters.ts"
import { SANDBOX_PREFERENCE } from "./types.ts"
import type { DetectedSandbox } from "./types.ts"

/** Look up each tool on PATH in preference order */
export const detectAvailableSandbox = (
  options: { readonly pathEnv?: string } = {}
): Effect.Effect<Option.Option<DetectedSandbox>, never, FileSystem.FileSystem> =>
  Effect.gen(function*() {
    for (const tool of SANDBOX_PREFERENCE) {
      const found = yield* resolveExecutable(ADAPTERS[tool].executable, options).pipe(Effect.option)
      if (Option.isSome(found)) {
        yield* Effect.logDebug("Sandbox detected", { tool, path: found.value })
        return Option.some<DetectedSandbox>({ tool, path: found.value })
      }
    }
    return Option.none<DetectedSandbox>()
  })

export class SandboxDetector extends Context.Tag("@ucode/sandbox/SandboxDetector")<
  SandboxDetector,
  {
    readonly detect: Effect.Effect<Option.Option<DetectedSandbox>>
  }
>() {
  static readonly layer: Layer.Layer<SandboxDetector, never, FileSystem.FileSystem> = Layer.effect(
    SandboxDetector,
    Effect.gen(function*() {
      const fs = yield* FileSystem.FileSystem
      const detect = yield* Effect.cached(
        detectAvailableSandbox().pipe(Effect.provideService(FileSystem.FileSystem, fs))
      )
      return SandboxDetector.of({ detect })
    })
  )

  /** Always report the given result; for tests and forced configurations */
  static fixed(result: Option.Option<DetectedSandbox>): Layer.Layer<SandboxDetector> {
    return Layer.succeed(SandboxDetector, SandboxDetector.of({ detect: Effect.succeed(result) }))
  }
}
