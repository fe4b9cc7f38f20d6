/**
 * Builder - turns a source file into something the Executor can run.
 *
 * The compiler runs in a caller-provided scratch directory with stdout and
 * stderr captured together. Compiler runs are not subject to the user timeout.
 */
import { Command, CommandExecutor, FileSystem } from "@effect/platform"
import { Context, Effect, Either, Layer, Option, Stream } from "effect"
import * as Path from "node:path"
import { Artifact } from "./domain.ts"
import type { LanguageSpec } from "./domain.ts"
import { CompileError, SpawnError } from "./errors.ts"
import { expandTemplate, formatCommandLine } from "./toolchain.ts"

export interface BuildRequest {
  readonly spec: LanguageSpec
  /** Absolute path of the source file */
  readonly sourcePath: string
  /** Absolute path of the compiler, already resolved on PATH */
  readonly compilerPath: string
  readonly flags: ReadonlyArray<string>
  /** Fresh empty directory owned by this build */
  readonly workDir: string
}

export interface CompilerRun {
  readonly output: string
  /** None when the compiler was killed by a signal */
  readonly exitCode: Option.Option<number>
}

interface BuilderInterface {
  readonly build: (request: BuildRequest) => Effect.Effect<Artifact, CompileError | SpawnError>
}

/** File name without its extension; used for the output binary and the Java main class */
export const mainNameOf = (sourcePath: string): string => Path.basename(sourcePath, Path.extname(sourcePath))

export const compileArgsFor = (request: BuildRequest): ReadonlyArray<string> =>
  expandTemplate(request.spec.compileArgs, {
    flags: request.flags,
    values: {
      source: request.sourcePath,
      output: Path.join(request.workDir, mainNameOf(request.sourcePath)),
      outDir: request.workDir
    }
  })

export class Builder extends Context.Tag("@ucode/Builder")<
  Builder,
  BuilderInterface
>() {
  static readonly layer: Layer.Layer<Builder, never, CommandExecutor.CommandExecutor | FileSystem.FileSystem> = Layer
    .effect(
      Builder,
      Effect.gen(function*() {
        const executor = yield* CommandExecutor.CommandExecutor
        const fs = yield* FileSystem.FileSystem

        const runCompiler = (compilerPath: string, args: ReadonlyArray<string>, cwd: string) =>
          Effect.scoped(
            Effect.gen(function*() {
              const cmd = Command.make(compilerPath, ...args).pipe(Command.workingDirectory(cwd))
              const process = yield* executor.start(cmd)

              // Both streams into one buffer, in arrival order
              const [output, exit] = yield* Effect.all([
                Stream.merge(process.stdout, process.stderr).pipe(Stream.decodeText(), Stream.mkString),
                Effect.either(process.exitCode)
              ], { concurrency: "unbounded" })

              return { output, exitCode: Option.map(Either.getRight(exit), Number) } satisfies CompilerRun
            })
          ).pipe(Effect.mapError((cause) => new SpawnError({ command: compilerPath, cause })))

        const build = (request: BuildRequest) =>
          Effect.gen(function*() {
            const { spec, sourcePath, workDir } = request
            if (!spec.compiles) return Artifact.SourceFile({ path: sourcePath })

            const args = compileArgsFor(request)
            yield* Effect.logDebug(`Compiling: ${formatCommandLine(request.compilerPath, args)}`)
            const run = yield* runCompiler(request.compilerPath, args, workDir)

            if (Option.isNone(run.exitCode) || run.exitCode.value !== 0) {
              return yield* new CompileError({
                source: sourcePath,
                failure: "nonzero_exit",
                exitCode: Option.getOrUndefined(run.exitCode),
                output: run.output
              })
            }
            if (run.output.trim() !== "") {
              yield* Effect.logDebug("Compiler output", run.output)
            }

            if (spec.strategy === "Compile") {
              const output = Path.join(workDir, mainNameOf(sourcePath))
              const isFile = yield* fs.stat(output).pipe(
                Effect.map((info) => info.type === "File"),
                Effect.orElseSucceed(() => false)
              )
              if (!isFile) {
                return yield* new CompileError({ source: sourcePath, failure: "missing_output", output: run.output })
              }
              return Artifact.Executable({ path: output })
            }

            const suffix = `.${spec.artifactExtension ?? ""}`
            const entries: ReadonlyArray<string> = yield* fs.readDirectory(workDir, { recursive: true }).pipe(
              Effect.orElseSucceed(() => [])
            )
            const files = entries.filter((entry) => entry.endsWith(suffix)).sort()
            if (files.length === 0) {
              return yield* new CompileError({ source: sourcePath, failure: "no_generated_files", output: run.output })
            }
            yield* Effect.logDebug(`Generated ${files.length} ${suffix} files`)
            return Artifact.RuntimeBundle({ directory: workDir, files })
          }).pipe(Effect.withLogSpan("build"))

        return Builder.of({ build })
      })
    )
}
