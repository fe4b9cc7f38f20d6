/**
 * Toolchain helpers: locating executables, resolving compiler flags and
 * expanding argv templates. Nothing here goes through a shell.
 */
import { FileSystem } from "@effect/platform"
import { Effect, Either, Option } from "effect"
import * as Path from "node:path"
import type { LanguageSpec } from "./domain.ts"
import { InvalidFlagsError, ToolNotFoundError } from "./errors.ts"

// =============================================================================
// Executable lookup
// =============================================================================

const isExecutableFile = (fs: FileSystem.FileSystem, candidate: string) =>
  fs.stat(candidate).pipe(
    Effect.map((info) => info.type === "File" && (info.mode & 0o111) !== 0),
    Effect.orElseSucceed(() => false)
  )

/**
 * Resolve a command name to an absolute path the way `command -v` does.
 * Names containing a slash are resolved against `cwd` instead of PATH.
 */
export const resolveExecutable = (
  command: string,
  options: { readonly cwd?: string; readonly pathEnv?: string } = {}
): Effect.Effect<string, ToolNotFoundError, FileSystem.FileSystem> =>
  Effect.gen(function*() {
    const fs = yield* FileSystem.FileSystem

    if (command.includes("/")) {
      const absolute = Path.resolve(options.cwd ?? process.cwd(), command)
      if (yield* isExecutableFile(fs, absolute)) return absolute
      return yield* new ToolNotFoundError({ command })
    }

    const searchPath = options.pathEnv ?? process.env.PATH ?? ""
    for (const dir of searchPath.split(Path.delimiter)) {
      if (dir === "") continue
      const candidate = Path.join(dir, command)
      if (yield* isExecutableFile(fs, candidate)) {
        return Path.resolve(candidate)
      }
    }
    return yield* new ToolNotFoundError({ command })
  })

// =============================================================================
// Flags
// =============================================================================

/**
 * Split a flag string into argv entries on whitespace. Single and double
 * quotes group words and are removed; a backslash escapes the next character
 * outside single quotes. No variable, glob or command expansion happens.
 */
export const tokenizeFlags = (flags: string): Either.Either<ReadonlyArray<string>, InvalidFlagsError> => {
  const tokens: Array<string> = []
  let current = ""
  let inToken = false
  let quote: "'" | "\"" | null = null

  for (let i = 0; i < flags.length; i++) {
    const ch = flags.charAt(i)

    if (quote !== null) {
      if (ch === quote) {
        quote = null
      } else if (ch === "\\" && quote === "\"" && i + 1 < flags.length) {
        current += flags.charAt(++i)
      } else {
        current += ch
      }
      continue
    }

    if (ch === "'" || ch === "\"") {
      quote = ch
      inToken = true
    } else if (ch === "\\") {
      if (i + 1 >= flags.length) {
        return Either.left(new InvalidFlagsError({ flags, reason: "trailing backslash" }))
      }
      current += flags.charAt(++i)
      inToken = true
    } else if (/\s/.test(ch)) {
      if (inToken) {
        tokens.push(current)
        current = ""
        inToken = false
      }
    } else {
      current += ch
      inToken = true
    }
  }

  if (quote !== null) {
    return Either.left(new InvalidFlagsError({ flags, reason: `unterminated ${quote} quote` }))
  }
  if (inToken) tokens.push(current)
  return Either.right(tokens)
}

/** The flag string in effect: a non-empty override wins over the table default */
export const resolveFlagString = (
  spec: LanguageSpec,
  overrides: Readonly<Record<string, string>>
): string => {
  if (spec.flagsEnvVar === undefined) return spec.defaultFlags
  const override = overrides[spec.flagsEnvVar]
  return override !== undefined && override.trim() !== "" ? override : spec.defaultFlags
}

export const resolveFlags = (
  spec: LanguageSpec,
  overrides: Readonly<Record<string, string>>
): Either.Either<ReadonlyArray<string>, InvalidFlagsError> => tokenizeFlags(resolveFlagString(spec, overrides))

/** Pick the flag variables the table knows about out of an environment */
export const collectFlagOverrides = (
  variables: ReadonlyArray<string>,
  env: Readonly<Record<string, string | undefined>>
): Record<string, string> => {
  const overrides: Record<string, string> = {}
  for (const name of variables) {
    const value = env[name]
    if (value !== undefined) overrides[name] = value
  }
  return overrides
}

// =============================================================================
// Argument templates
// =============================================================================

export interface TemplateBindings {
  readonly flags?: ReadonlyArray<string>
  readonly values: Readonly<Record<string, string>>
}

/**
 * Expand an argv template. A bare `{flags}` entry becomes zero or more
 * entries; other `{name}` placeholders are substituted in place. Unknown
 * placeholders are kept literally.
 */
export const expandTemplate = (
  template: ReadonlyArray<string>,
  bindings: TemplateBindings
): ReadonlyArray<string> =>
  template.flatMap((entry) => {
    if (entry === "{flags}") return [...(bindings.flags ?? [])]
    return [
      entry.replace(/\{(\w+)\}/g, (match, name: string) =>
        Option.getOrElse(Option.fromNullable(bindings.values[name]), () => match))
    ]
  })

// =============================================================================
// Display helpers
// =============================================================================

const SHELL_METACHARACTERS = /[;&|<>$()\\`*?~!#'"\s{}[\]]/

export const hasShellMetacharacters = (arg: string): boolean => SHELL_METACHARACTERS.test(arg)

/** Characters that would chain, redirect or substitute if the value ever reached a shell */
const UNSAFE_CHARACTERS = /[;&|<>$()\\`]/

export const isUnsafeArgument = (arg: string): boolean => UNSAFE_CHARACTERS.test(arg)

/** POSIX single-quote an argument for display in a copy-pasteable command line */
export const shellQuote = (arg: string): string =>
  arg === "" ? "''" : hasShellMetacharacters(arg) ? `'${arg.replace(/'/g, `'\\''`)}'` : arg

export const formatCommandLine = (command: string, args: ReadonlyArray<string>): string =>
  [command, ...args].map(shellQuote).join(" ")
