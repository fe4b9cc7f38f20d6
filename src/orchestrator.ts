/**
 * Orchestrator - one invocation from source file to RunReport.
 *
 * resolve language → (compiled languages) key → cache lookup → build on miss
 * → store → execute → classify.
 *
 * Cache failures are logged at debug and treated as a miss or a skipped
 * store. Configuration problems end the run as errors; a compile failure ends
 * it with a Failed report carrying the compiler output.
 */
import { FileSystem } from "@effect/platform"
import { Context, Effect, Either, Layer, Option } from "effect"
import * as os from "node:os"
import * as Path from "node:path"
import { Builder, mainNameOf } from "./builder.ts"
import { CacheStore, computeKey } from "./cache-store.ts"
import type { BuiltArtifact } from "./cache-store.ts"
import { Artifact, entryKindOf, TIMEOUT_EXIT_CODE } from "./domain.ts"
import type {
  CacheKey,
  EntryHandle,
  ExecutionOutcome,
  LanguageSpec,
  RunOptions,
  RunReport,
  RunStatus,
  SourceFile
} from "./domain.ts"
import { CacheError, SourceNotFoundError } from "./errors.ts"
import type { ConfigError, SpawnError } from "./errors.ts"
import { Executor } from "./executor.ts"
import { LanguageRegistry } from "./language-registry.ts"
import { RunReporter } from "./reporter.ts"
import { expandTemplate, resolveExecutable, resolveFlags } from "./toolchain.ts"

const signalNumber = (signal: NodeJS.Signals): number => {
  for (const [name, value] of Object.entries(os.constants.signals)) {
    if (name === signal && typeof value === "number") return value
  }
  return 0
}

/** Shell convention for signals: 128 + signal number */
export const exitCodeOf = (outcome: ExecutionOutcome): number => {
  switch (outcome._tag) {
    case "Success":
      return 0
    case "NonZeroExit":
      return outcome.code
    case "TimedOut":
      return TIMEOUT_EXIT_CODE
    case "Signaled":
      return 128 + signalNumber(outcome.signal)
  }
}

export const statusOf = (outcome: ExecutionOutcome): RunStatus =>
  outcome._tag === "Success" ? "Success" : outcome._tag === "TimedOut" ? "TimedOut" : "Failed"

interface OrchestratorInterface {
  readonly run: (source: SourceFile, options: RunOptions) => Effect.Effect<RunReport, ConfigError | SpawnError>
  /** Remove every cache entry; returns the number removed */
  readonly cleanCache: Effect.Effect<number, CacheError>
}

export class Orchestrator extends Context.Tag("@ucode/Orchestrator")<
  Orchestrator,
  OrchestratorInterface
>() {
  static readonly layer: Layer.Layer<
    Orchestrator,
    never,
    LanguageRegistry | CacheStore | Builder | Executor | RunReporter | FileSystem.FileSystem
  > = Layer.effect(
    Orchestrator,
    Effect.gen(function*() {
      const registry = yield* LanguageRegistry
      const cache = yield* CacheStore
      const builder = yield* Builder
      const executor = yield* Executor
      const reporter = yield* RunReporter
      const fs = yield* FileSystem.FileSystem

      const readSource = (path: string) =>
        fs.readFile(path).pipe(
          Effect.mapError(() => new SourceNotFoundError({ path, supported: registry.extensions }))
        )

      /** Cache lookup with every failure downgraded to a miss */
      const lookup = (key: CacheKey, spec: LanguageSpec) =>
        cache.initialize.pipe(
          Effect.zipRight(cache.lookup(key, entryKindOf(spec))),
          Effect.catchAll((error) =>
            Effect.logDebug("Cache lookup failed, building", error.message).pipe(
              Effect.as(Option.none<EntryHandle>())
            )
          )
        )

      /**
       * Copy a hit out of the cache into this run's scratch directory, so a
       * concurrent eviction cannot pull it away mid-run.
       */
      const materialize = (handle: EntryHandle, sourcePath: string, directory: string) =>
        Effect.gen(function*() {
          yield* fs.makeDirectory(directory, { recursive: true }).pipe(
            Effect.mapError((cause) => new CacheError({ operation: "restore", path: directory, cause }))
          )
          if (handle.kind === "archive") {
            const files = yield* cache.restore(handle, directory)
            return Artifact.RuntimeBundle({ directory, files })
          }
          const target = Path.join(directory, mainNameOf(sourcePath))
          yield* fs.copyFile(handle.path, target).pipe(
            Effect.zipRight(fs.chmod(target, 0o755)),
            Effect.mapError((cause) => new CacheError({ operation: "restore", path: handle.path, cause }))
          )
          return Artifact.Executable({ path: target })
        })

      const persist = (key: CacheKey, artifact: BuiltArtifact) =>
        cache.store(key, artifact).pipe(
          Effect.asVoid,
          Effect.catchAll((error) => Effect.logDebug("Could not cache build", error.message))
        )

      const run = (source: SourceFile, options: RunOptions) =>
        Effect.gen(function*() {
          const spec = yield* registry.resolve(source.extension)
          const sourcePath = Path.resolve(options.workingDirectory, source.path)
          yield* reporter.started(spec.name, Path.basename(sourcePath))

          const runnerPath = spec.runnerCommand === undefined
            ? Option.none<string>()
            : Option.some(yield* resolveExecutable(spec.runnerCommand))

          const report = (status: RunStatus, fields: Omit<RunReport, "status" | "language" | "extension">) =>
            reporter.status(status).pipe(
              Effect.as<RunReport>({ status, language: spec.name, extension: spec.extension, ...fields })
            )

          let artifact: Artifact
          let cacheHit = false

          if (spec.compilerCommand === undefined) {
            yield* readSource(sourcePath)
            artifact = Artifact.SourceFile({ path: sourcePath })
          } else {
            const compilerPath = yield* resolveExecutable(spec.compilerCommand)
            const flags = yield* resolveFlags(spec, options.flagOverrides)
            const bytes = yield* readSource(sourcePath)
            const key = computeKey(bytes, compilerPath, flags)

            const scratch = yield* fs.makeTempDirectoryScoped({ prefix: "ucode-" }).pipe(Effect.orDie)

            const cached = options.cacheEnabled
              ? yield* lookup(key, spec).pipe(
                Effect.flatMap(Option.match({
                  onNone: () => Effect.succeed(Option.none<Artifact>()),
                  onSome: (handle) =>
                    materialize(handle, sourcePath, Path.join(scratch, "cached")).pipe(
                      Effect.map(Option.some),
                      Effect.catchAll((error) =>
                        Effect.logDebug("Cached build unusable, rebuilding", error.message).pipe(
                          Effect.as(Option.none<Artifact>())
                        )
                      )
                    )
                }))
              )
              : Option.none<Artifact>()

            if (Option.isSome(cached)) {
              yield* reporter.status("UsingCache")
              yield* Effect.logDebug("Cache hit", { key })
              artifact = cached.value
              cacheHit = true
            } else {
              yield* reporter.status("Compiling")
              const workDir = Path.join(scratch, "build")
              yield* fs.makeDirectory(workDir).pipe(Effect.orDie)
              const built = yield* builder.build({ spec, sourcePath, compilerPath, flags, workDir }).pipe(Effect.either)
              if (Either.isLeft(built)) {
                const error = built.left
                if (error._tag === "SpawnError") return yield* error
                yield* Effect.logDebug(error.message)
                return yield* report("Failed", {
                  exitCode: 1,
                  cacheHit: false,
                  execution: Option.none(),
                  compilerOutput: Option.some(error.output)
                })
              }
              artifact = built.right
              if (options.cacheEnabled && artifact._tag !== "SourceFile") {
                yield* persist(key, artifact)
              }
            }
          }

          const { command, args } = commandFor(spec, artifact, sourcePath, runnerPath)
          yield* reporter.status("Executing")
          const execution = yield* executor.run({
            command,
            args: [...args, ...options.args],
            workingDirectory: options.workingDirectory,
            limits: options.limits,
            stdin: options.stdin
          })

          return yield* report(statusOf(execution.outcome), {
            exitCode: exitCodeOf(execution.outcome),
            cacheHit,
            execution: Option.some(execution),
            compilerOutput: Option.none()
          })
        }).pipe(
          Effect.scoped,
          Effect.provideService(FileSystem.FileSystem, fs),
          Effect.withSpan("orchestrator.run")
        )

      const cleanCache = cache.evictAll

      return Orchestrator.of({ run, cleanCache })
    })
  )
}

/** The argv that runs an artifact, before the user's own arguments */
export const commandFor = (
  spec: LanguageSpec,
  artifact: Artifact,
  sourcePath: string,
  runnerPath: Option.Option<string>
): { readonly command: string; readonly args: ReadonlyArray<string> } => {
  if (artifact._tag === "Executable") return { command: artifact.path, args: [] }
  const values: Readonly<Record<string, string>> = artifact._tag === "RuntimeBundle"
    ? { source: sourcePath, artifactDir: artifact.directory, mainName: mainNameOf(sourcePath) }
    : { source: sourcePath }
  return {
    command: Option.getOrElse(runnerPath, () => sourcePath),
    args: expandTemplate(spec.runArgs, { values })
  }
}
