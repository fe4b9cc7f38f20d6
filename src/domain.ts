/**
 * Domain types for the runner.
 *
 * Everything a single invocation passes between the registry, cache, builder,
 * executor and orchestrator lives here. Values that cross a persistence
 * boundary (the language table) are Schemas; the rest are plain data.
 */
import { Data, Option, Schema } from "effect"

// -----------------------------------------------------------------------------
// Branded Types
// -----------------------------------------------------------------------------

/** Hex fingerprint of (source bytes, resolved compiler path, flags) */
export const CacheKey = Schema.String.pipe(
  Schema.pattern(/^[0-9a-f]{32}$/),
  Schema.brand("CacheKey")
)
export type CacheKey = typeof CacheKey.Type

// -----------------------------------------------------------------------------
// Language Table
// -----------------------------------------------------------------------------

export const Strategy = Schema.Literal("Direct", "Compile", "CompileToRuntimeArtifact")
export type Strategy = typeof Strategy.Type

/**
 * One row of the language table.
 *
 * Argument templates are lists of discrete argv entries. Placeholders:
 * - compileArgs: `{flags}` (expands to zero or more entries), `{source}`, `{output}`, `{outDir}`
 * - runArgs: `{source}`, `{artifactDir}`, `{mainName}`
 */
export class LanguageSpec extends Schema.Class<LanguageSpec>("LanguageSpec")({
  extension: Schema.String.pipe(Schema.pattern(/^[A-Za-z0-9+_-]+$/)),
  name: Schema.String,
  strategy: Strategy,
  compilerCommand: Schema.optional(Schema.String),
  runnerCommand: Schema.optional(Schema.String),
  flagsEnvVar: Schema.optional(Schema.String),
  defaultFlags: Schema.optionalWith(Schema.String, { default: () => "" }),
  compileArgs: Schema.optionalWith(Schema.Array(Schema.String), {
    default: () => ["{flags}", "{source}", "-o", "{output}"]
  }),
  runArgs: Schema.optionalWith(Schema.Array(Schema.String), { default: () => ["{source}"] }),
  artifactExtension: Schema.optional(Schema.String)
}) {
  get compiles(): boolean {
    return this.strategy !== "Direct"
  }
}

// -----------------------------------------------------------------------------
// Artifacts
// -----------------------------------------------------------------------------

/** What the Builder hands to the Executor */
export type Artifact = Data.TaggedEnum<{
  /** Direct strategy: the source file itself, run by the interpreter */
  SourceFile: { readonly path: string }
  /** Compile strategy: one native executable */
  Executable: { readonly path: string }
  /** CompileToRuntimeArtifact: generated files that must be restored as a set */
  RuntimeBundle: { readonly directory: string; readonly files: ReadonlyArray<string> }
}>
export const Artifact = Data.taggedEnum<Artifact>()

export type EntryKind = "executable" | "archive"

export const entryKindOf = (spec: LanguageSpec): EntryKind =>
  spec.strategy === "CompileToRuntimeArtifact" ? "archive" : "executable"

/** A cache entry that passed the existence, permission and age checks */
export interface EntryHandle {
  readonly key: CacheKey
  readonly kind: EntryKind
  readonly path: string
  readonly modifiedAt: Date
}

// -----------------------------------------------------------------------------
// Execution
// -----------------------------------------------------------------------------

export type StdinMode = "inherit" | "ignore"

export interface ResourceLimits {
  /** Wall-clock limit in milliseconds, 0 = unbounded */
  readonly timeoutMs: number
  /** Address-space limit in bytes, 0 = unbounded (only enforced inside a sandbox) */
  readonly memoryLimitBytes: number
  readonly sandbox: boolean
  /** Delay between SIGTERM and SIGKILL once the deadline passed */
  readonly killGraceMs: number
}

export interface ExecutionRequest {
  readonly command: string
  readonly args: ReadonlyArray<string>
  readonly workingDirectory: string
  readonly limits: ResourceLimits
  readonly stdin: StdinMode
}

export type ExecutionOutcome = Data.TaggedEnum<{
  Success: {}
  NonZeroExit: { readonly code: number }
  TimedOut: { readonly timeoutMs: number }
  Signaled: { readonly signal: NodeJS.Signals }
}>
export const ExecutionOutcome = Data.taggedEnum<ExecutionOutcome>()

export interface ExecutionResult {
  readonly stdout: string
  readonly stderr: string
  /** stdout and stderr interleaved in arrival order */
  readonly output: string
  readonly outcome: ExecutionOutcome
  readonly durationMs: number
  readonly sandboxTool: Option.Option<string>
}

// -----------------------------------------------------------------------------
// Orchestration
// -----------------------------------------------------------------------------

export const RunStatus = Schema.Literal("Compiling", "UsingCache", "Executing", "Success", "Failed", "TimedOut")
export type RunStatus = typeof RunStatus.Type

/** Per-invocation options, built once by the CLI */
export interface RunOptions {
  readonly args: ReadonlyArray<string>
  /** Where the program runs and relative source paths resolve */
  readonly workingDirectory: string
  readonly limits: ResourceLimits
  readonly cacheEnabled: boolean
  readonly stdin: StdinMode
  /** Values of the language flag variables (CFLAGS, RUSTFLAGS, ...) captured at startup */
  readonly flagOverrides: Readonly<Record<string, string>>
}

export interface SourceFile {
  readonly path: string
  readonly extension: string
}

export interface RunReport {
  readonly status: RunStatus
  readonly exitCode: number
  readonly cacheHit: boolean
  readonly language: string
  /** Table extension of the source; selects the highlighter's lexer */
  readonly extension: string
  readonly execution: Option.Option<ExecutionResult>
  readonly compilerOutput: Option.Option<string>
}

/** Conventional exit code of the `timeout` utility */
export const TIMEOUT_EXIT_CODE = 124
