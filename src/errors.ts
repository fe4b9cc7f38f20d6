/**
 * Error Types
 *
 * Uses Schema.TaggedError for serializable, type-safe error handling.
 * Configuration problems and compile failures end the run; CacheError never
 * leaves the orchestrator.
 */
import { Schema } from "effect"

// =============================================================================
// Configuration Errors
// =============================================================================

export class UnsupportedLanguageError extends Schema.TaggedError<UnsupportedLanguageError>()(
  "UnsupportedLanguageError",
  {
    extension: Schema.String,
    supported: Schema.Array(Schema.String)
  }
) {
  override get message(): string {
    const ext = this.extension === "" ? "(none)" : `.${this.extension}`
    return `Unsupported file type: ${ext}. Supported types are: ${this.supported.map((e) => `.${e}`).join(" ")}`
  }
}

export class InvalidFlagsError extends Schema.TaggedError<InvalidFlagsError>()(
  "InvalidFlagsError",
  {
    flags: Schema.String,
    reason: Schema.String
  }
) {
  override get message(): string {
    return `Malformed compiler flags "${this.flags}": ${this.reason}`
  }
}

export class ToolNotFoundError extends Schema.TaggedError<ToolNotFoundError>()(
  "ToolNotFoundError",
  {
    command: Schema.String
  }
) {
  override get message(): string {
    return `Required command not found: ${this.command}`
  }
}

export class LanguageTableError extends Schema.TaggedError<LanguageTableError>()(
  "LanguageTableError",
  {
    source: Schema.String,
    reason: Schema.String,
    cause: Schema.optional(Schema.Defect)
  }
) {
  override get message(): string {
    return `Invalid language table ${this.source}: ${this.reason}`
  }
}

export class SourceNotFoundError extends Schema.TaggedError<SourceNotFoundError>()(
  "SourceNotFoundError",
  {
    path: Schema.String,
    supported: Schema.Array(Schema.String)
  }
) {
  override get message(): string {
    return this.path === ""
      ? `No supported code files found. Supported extensions: ${this.supported.map((e) => `.${e}`).join(" ")}`
      : `File not found: ${this.path}`
  }
}

export class OptionValidationError extends Schema.TaggedError<OptionValidationError>()(
  "OptionValidationError",
  {
    option: Schema.String,
    value: Schema.Number,
    min: Schema.Number,
    max: Schema.Number
  }
) {
  override get message(): string {
    return `${this.option} must be between ${this.min} and ${this.max}, got ${this.value}`
  }
}

export type ConfigError =
  | UnsupportedLanguageError
  | InvalidFlagsError
  | ToolNotFoundError
  | LanguageTableError
  | SourceNotFoundError
  | OptionValidationError

// =============================================================================
// Build Errors
// =============================================================================

export const CompileFailure = Schema.Literal("nonzero_exit", "missing_output", "no_generated_files")
export type CompileFailure = typeof CompileFailure.Type

export class CompileError extends Schema.TaggedError<CompileError>()(
  "CompileError",
  {
    source: Schema.String,
    failure: CompileFailure,
    exitCode: Schema.optional(Schema.Number),
    /** Combined compiler stdout+stderr, verbatim */
    output: Schema.String
  }
) {
  override get message(): string {
    switch (this.failure) {
      case "nonzero_exit":
        return `Compilation failed for ${this.source} (exit code ${this.exitCode ?? "unknown"})`
      case "missing_output":
        return `Compiler reported success for ${this.source} but produced no executable`
      case "no_generated_files":
        return `Compiler reported success for ${this.source} but generated no files`
    }
  }
}

// =============================================================================
// Cache Errors
// =============================================================================

export const CacheOperation = Schema.Literal("resolve", "lookup", "store", "restore", "evict")
export type CacheOperation = typeof CacheOperation.Type

export class CacheError extends Schema.TaggedError<CacheError>()(
  "CacheError",
  {
    operation: CacheOperation,
    path: Schema.String,
    cause: Schema.optional(Schema.Defect)
  }
) {
  override get message(): string {
    return `Cache ${this.operation} failed for ${this.path}`
  }
}

// =============================================================================
// Execution Errors
// =============================================================================

export class SpawnError extends Schema.TaggedError<SpawnError>()(
  "SpawnError",
  {
    command: Schema.String,
    cause: Schema.optional(Schema.Defect)
  }
) {
  override get message(): string {
    return `Failed to start ${this.command}`
  }
}
