/**
 * Discovery - which file to run, and what language it is.
 *
 * A shebang line wins over the file suffix, so an extensionless script with
 * `#!/usr/bin/env python3` runs as Python.
 */
import { FileSystem } from "@effect/platform"
import { Effect, Option } from "effect"
import * as Path from "node:path"
import type { SourceFile } from "./domain.ts"
import { SourceNotFoundError } from "./errors.ts"
import { normalizeExtension } from "./language-registry.ts"

/** Interpreter names, as they appear in a shebang, mapped to table extensions */
export const SHEBANG_INTERPRETERS: Readonly<Record<string, string>> = {
  python: "py",
  python3: "py",
  node: "js",
  nodejs: "js",
  tsx: "ts",
  "ts-node": "ts",
  bash: "sh",
  sh: "sh",
  dash: "sh",
  zsh: "sh",
  ruby: "rb",
  perl: "pl",
  php: "php",
  lua: "lua"
}

/**
 * Name of the interpreter a shebang line invokes: `#!/bin/bash` → `bash`,
 * `#!/usr/bin/env -S node --flag` → `node`.
 */
export const parseShebang = (firstLine: string): Option.Option<string> => {
  if (!firstLine.startsWith("#!")) return Option.none()
  const tokens = firstLine.slice(2).trim().split(/\s+/).filter((token) => token !== "")
  const [program, ...rest] = tokens
  if (program === undefined) return Option.none()

  if (Path.basename(program) !== "env") return Option.some(Path.basename(program))
  // env: skip its own options (-S, -i, -u NAME, VAR=value)
  for (let i = 0; i < rest.length; i++) {
    const token = rest[i]
    if (token === undefined) break
    if (token === "-u" || token === "--unset") {
      i++
      continue
    }
    if (token.startsWith("-") || token.includes("=")) continue
    return Option.some(Path.basename(token))
  }
  return Option.none()
}

/** `python3.12` → `py`; unknown interpreters give none */
export const extensionForInterpreter = (interpreter: string): Option.Option<string> =>
  Option.orElse(
    Option.fromNullable(SHEBANG_INTERPRETERS[interpreter]),
    () => Option.fromNullable(SHEBANG_INTERPRETERS[interpreter.replace(/[\d.]+$/, "")])
  )

export const suffixExtension = (path: string): string => normalizeExtension(Path.extname(path))

const firstLine = (content: string): string => {
  const end = content.indexOf("\n")
  return (end === -1 ? content : content.slice(0, end)).replace(/\r$/, "")
}

/** Bytes read to find a shebang; longer first lines are not interpreter lines */
const SHEBANG_PEEK_BYTES = 256

const readHead = (fs: FileSystem.FileSystem, path: string) =>
  fs.open(path, { flag: "r" }).pipe(
    Effect.flatMap((file) => file.readAlloc(SHEBANG_PEEK_BYTES)),
    Effect.map(Option.match({
      onNone: () => "",
      onSome: (bytes) => new TextDecoder().decode(bytes)
    })),
    Effect.scoped,
    Effect.orElseSucceed(() => "")
  )

/** Language extension of a file: a recognized shebang first, then the suffix */
export const detectExtension = (path: string, supported: ReadonlyArray<string>) =>
  Effect.gen(function*() {
    const fs = yield* FileSystem.FileSystem
    const content = yield* readHead(fs, path)
    const fromShebang = Option.filter(
      Option.flatMap(parseShebang(firstLine(content)), extensionForInterpreter),
      (extension) => supported.includes(extension)
    )
    return Option.getOrElse(fromShebang, () => suffixExtension(path))
  })

const isFile = (fs: FileSystem.FileSystem, path: string) =>
  fs.stat(path).pipe(
    Effect.map((info) => info.type === "File"),
    Effect.orElseSucceed(() => false)
  )

/**
 * Split positional arguments into the source file and the program's own
 * arguments. The first positional names the file when it exists or carries a
 * supported suffix; otherwise every positional goes to the program.
 */
export const splitInvocation = (
  cwd: string,
  positionals: ReadonlyArray<string>,
  supported: ReadonlyArray<string>
) =>
  Effect.gen(function*() {
    const fs = yield* FileSystem.FileSystem
    const [first, ...rest] = positionals
    if (first === undefined) return { explicit: Option.none<string>(), args: positionals }
    const looksLikeSource = supported.includes(suffixExtension(first)) || (yield* isFile(fs, Path.resolve(cwd, first)))
    return looksLikeSource
      ? { explicit: Option.some(first), args: rest }
      : { explicit: Option.none<string>(), args: positionals }
  })

/**
 * The explicit file when given, else the most recently modified supported file
 * in `cwd` (ties broken by name).
 */
export const discover = (
  cwd: string,
  explicit: Option.Option<string>,
  supported: ReadonlyArray<string>
): Effect.Effect<SourceFile, SourceNotFoundError, FileSystem.FileSystem> =>
  Effect.gen(function*() {
    const fs = yield* FileSystem.FileSystem

    if (Option.isSome(explicit)) {
      const path = Path.resolve(cwd, explicit.value)
      if (!(yield* isFile(fs, path))) {
        return yield* new SourceNotFoundError({ path: explicit.value, supported })
      }
      return { path, extension: yield* detectExtension(path, supported) }
    }

    const names = yield* fs.readDirectory(cwd).pipe(Effect.orElseSucceed((): ReadonlyArray<string> => []))
    type Candidate = { readonly file: SourceFile; readonly mtime: number; readonly name: string }
    let best = Option.none<Candidate>()

    for (const name of names) {
      const path = Path.join(cwd, name)
      const info = yield* fs.stat(path).pipe(Effect.option)
      if (Option.isNone(info) || info.value.type !== "File") continue

      // Files with a foreign suffix are never opened
      const suffix = suffixExtension(name)
      if (suffix !== "" && !supported.includes(suffix)) continue
      const extension = yield* detectExtension(path, supported)
      if (!supported.includes(extension)) continue

      const mtime = Option.getOrElse(Option.map(info.value.mtime, (date) => date.getTime()), () => 0)
      const isNewer = Option.match(best, {
        onNone: () => true,
        onSome: (current) => mtime > current.mtime || (mtime === current.mtime && name < current.name)
      })
      if (isNewer) best = Option.some({ file: { path, extension }, mtime, name })
    }

    if (Option.isNone(best)) {
      return yield* new SourceNotFoundError({ path: "", supported })
    }
    yield* Effect.logDebug("Discovered source file", { path: best.value.file.path })
    return best.value.file
  })
