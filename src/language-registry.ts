/**
 * LanguageRegistry - maps file extensions to execution strategies.
 *
 * The table is data: the bundled `languages.yaml`, or the file named by the
 * LANGUAGES_FILE setting. It is decoded and checked once when the layer is
 * built; lookups afterwards are pure.
 */
import { FileSystem } from "@effect/platform"
import { Context, Effect, Either, Layer, Option, Schema } from "effect"
import { fileURLToPath } from "node:url"
import * as yaml from "yaml"
import { AppConfig } from "./config.ts"
import { LanguageSpec } from "./domain.ts"
import { LanguageTableError, UnsupportedLanguageError } from "./errors.ts"

export const BUNDLED_TABLE_PATH = fileURLToPath(new URL("./languages.yaml", import.meta.url))

const LanguageTable = Schema.Struct({
  languages: Schema.Array(LanguageSpec)
})

interface LanguageRegistryInterface {
  readonly resolve: (extension: string) => Effect.Effect<LanguageSpec, UnsupportedLanguageError>
  /** Sorted, without the leading dot */
  readonly extensions: ReadonlyArray<string>
  readonly languages: ReadonlyArray<LanguageSpec>
}

export const normalizeExtension = (extension: string): string => extension.replace(/^\./, "").toLowerCase()

/** Reason the row breaks a table invariant, if it does */
const checkSpec = (spec: LanguageSpec): Option.Option<string> => {
  switch (spec.strategy) {
    case "Direct":
      return spec.runnerCommand === undefined
        ? Option.some(`.${spec.extension}: Direct strategy requires runnerCommand`)
        : Option.none()
    case "Compile":
      return spec.compilerCommand === undefined
        ? Option.some(`.${spec.extension}: Compile strategy requires compilerCommand`)
        : Option.none()
    case "CompileToRuntimeArtifact":
      if (spec.compilerCommand === undefined || spec.runnerCommand === undefined) {
        return Option.some(
          `.${spec.extension}: CompileToRuntimeArtifact strategy requires compilerCommand and runnerCommand`
        )
      }
      return spec.artifactExtension === undefined
        ? Option.some(`.${spec.extension}: CompileToRuntimeArtifact strategy requires artifactExtension`)
        : Option.none()
  }
}

/** Build a registry from already-decoded rows, enforcing the table invariants */
export const makeRegistry = (
  specs: ReadonlyArray<LanguageSpec>,
  source = "<inline>"
): Either.Either<LanguageRegistryInterface, LanguageTableError> => {
  const byExtension = new Map<string, LanguageSpec>()
  for (const spec of specs) {
    const key = normalizeExtension(spec.extension)
    if (byExtension.has(key)) {
      return Either.left(new LanguageTableError({ source, reason: `duplicate extension .${key}` }))
    }
    const problem = checkSpec(spec)
    if (Option.isSome(problem)) {
      return Either.left(new LanguageTableError({ source, reason: problem.value }))
    }
    byExtension.set(key, spec)
  }

  const extensions = Array.from(byExtension.keys()).sort()

  return Either.right({
    extensions,
    languages: Array.from(byExtension.values()),
    resolve: (extension: string) => {
      const spec = byExtension.get(normalizeExtension(extension))
      return spec === undefined
        ? Effect.fail(new UnsupportedLanguageError({ extension: normalizeExtension(extension), supported: extensions }))
        : Effect.succeed(spec)
    }
  })
}

/** Read and decode a YAML language table */
export const loadLanguageTable = (path: string) =>
  Effect.gen(function*() {
    const fs = yield* FileSystem.FileSystem
    const content = yield* fs.readFileString(path).pipe(
      Effect.mapError((cause) => new LanguageTableError({ source: path, reason: "cannot read file", cause }))
    )
    const parsed = yield* Effect.try({
      try: (): unknown => yaml.parse(content),
      catch: (cause) => new LanguageTableError({ source: path, reason: "invalid YAML", cause })
    })
    const table = yield* Schema.decodeUnknown(LanguageTable)(parsed).pipe(
      Effect.mapError((cause) => new LanguageTableError({ source: path, reason: cause.message }))
    )
    return yield* makeRegistry(table.languages, path)
  })

export class LanguageRegistry extends Context.Tag("@ucode/LanguageRegistry")<
  LanguageRegistry,
  LanguageRegistryInterface
>() {
  /** Loads the table named by LANGUAGES_FILE, or the bundled one */
  static readonly layer: Layer.Layer<LanguageRegistry, LanguageTableError, AppConfig | FileSystem.FileSystem> = Layer
    .effect(
      LanguageRegistry,
      Effect.gen(function*() {
        const config = yield* AppConfig
        const path = Option.getOrElse(config.languagesFile, () => BUNDLED_TABLE_PATH)
        const registry = yield* loadLanguageTable(path)
        yield* Effect.logDebug("Loaded language table", { path, extensions: registry.extensions })
        return registry
      })
    )

  /** Registry over an explicit list of rows (tests, embedding) */
  static fromSpecs(specs: ReadonlyArray<LanguageSpec>): Layer.Layer<LanguageRegistry, LanguageTableError> {
    return Layer.effect(LanguageRegistry, makeRegistry(specs))
  }
}
