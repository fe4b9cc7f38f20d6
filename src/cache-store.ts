/**
 * CacheStore - content-addressed store of build artifacts.
 *
 * Storage structure (flat, no index file):
 * - {cacheDir}/{key}      single executable, mode 0755
 * - {cacheDir}/{key}.zip  archive of generated intermediate files
 *
 * The file's mtime is the entry's creation time. Writes go to a unique
 * temporary name in the same directory and are renamed into place, so a
 * concurrent lookup sees either nothing or a complete entry. Several
 * processes may share the directory; deleting a file someone else already
 * deleted is not an error.
 *
 * Every failure is a CacheError. Callers treat it as a miss and carry on.
 */
import { FileSystem } from "@effect/platform"
import type { Error as PlatformError } from "@effect/platform"
import { Clock, Context, Effect, Layer, Option } from "effect"
import JSZip from "jszip"
import { createHash, randomBytes } from "node:crypto"
import * as Path from "node:path"
import { AppConfig, resolveCacheDir } from "./config.ts"
import { CacheKey } from "./domain.ts"
import type { Artifact, EntryHandle, EntryKind } from "./domain.ts"
import { CacheError } from "./errors.ts"

// =============================================================================
// Keys
// =============================================================================

/**
 * Fingerprint of (source bytes, resolved compiler path, ordered flags).
 * The source is length-prefixed and the flags JSON-encoded so that no two
 * distinct inputs share a byte stream.
 */
export const computeKey = (
  source: Uint8Array,
  compilerPath: string,
  flags: ReadonlyArray<string>
): CacheKey => {
  const hash = createHash("sha256")
  hash.update(`${source.byteLength}:`)
  hash.update(source)
  hash.update(`\0${compilerPath}\0`)
  hash.update(JSON.stringify(flags))
  return CacheKey.make(hash.digest("hex").slice(0, 32))
}

export const entryFileName = (key: CacheKey, kind: EntryKind): string =>
  kind === "archive" ? `${key}.zip` : key

// =============================================================================
// Service
// =============================================================================

/** Artifacts that can be persisted (a Direct source never is) */
export type BuiltArtifact = Extract<Artifact, { readonly _tag: "Executable" | "RuntimeBundle" }>

interface CacheStoreInterface {
  readonly directory: string
  readonly maxAgeSeconds: number
  /** Create the cache directory if needed; safe to race with other processes */
  readonly resolveCacheDirectory: Effect.Effect<string, CacheError>
  /** Startup sweep of stale entries; runs at most once per store instance */
  readonly initialize: Effect.Effect<void>
  readonly lookup: (key: CacheKey, kind: EntryKind) => Effect.Effect<Option.Option<EntryHandle>, CacheError>
  readonly store: (key: CacheKey, artifact: BuiltArtifact) => Effect.Effect<EntryHandle, CacheError>
  /** Extract an archive entry into `directory`; returns the restored relative paths */
  readonly restore: (handle: EntryHandle, directory: string) => Effect.Effect<ReadonlyArray<string>, CacheError>
  /** Returns the number of entries removed */
  readonly evictOlderThan: (maxAgeSeconds: number) => Effect.Effect<number, CacheError>
  readonly evictAll: Effect.Effect<number, CacheError>
}

export interface CacheStoreOptions {
  readonly directory: string
  readonly maxAgeSeconds: number
}

const isNotFound = (error: PlatformError.PlatformError): boolean =>
  error._tag === "SystemError" && error.reason === "NotFound"

/** Reject archive members that would land outside the restore directory */
const isSafeMember = (name: string): boolean =>
  name !== "" && !Path.isAbsolute(name) && !name.split(/[\\/]/).includes("..")

export const makeCacheStore = (options: CacheStoreOptions) =>
  Effect.gen(function*() {
    const fs = yield* FileSystem.FileSystem
    const { directory, maxAgeSeconds } = options

    const fail = (operation: CacheError["operation"], path: string) => (cause: unknown) =>
      new CacheError({ operation, path, cause })

    /** Remove a path; someone else removing it first is fine */
    const removeQuietly = (path: string, operation: CacheError["operation"]) =>
      fs.remove(path, { recursive: true }).pipe(
        Effect.catchIf(isNotFound, () => Effect.void),
        Effect.mapError(fail(operation, path))
      )

    const statOption = (path: string, operation: CacheError["operation"]) =>
      fs.stat(path).pipe(
        Effect.map(Option.some),
        Effect.catchIf(isNotFound, () => Effect.succeed(Option.none<FileSystem.File.Info>())),
        Effect.mapError(fail(operation, path))
      )

    const resolveCacheDirectory = fs.makeDirectory(directory, { recursive: true }).pipe(
      Effect.as(directory),
      Effect.mapError(fail("resolve", directory))
    )

    const listEntries = Effect.gen(function*() {
      const exists = yield* fs.exists(directory).pipe(Effect.mapError(fail("evict", directory)))
      if (!exists) return [] as ReadonlyArray<string>
      return yield* fs.readDirectory(directory).pipe(Effect.mapError(fail("evict", directory)))
    })

    const ageMillis = (info: FileSystem.File.Info, now: number): Option.Option<number> =>
      Option.map(info.mtime, (mtime) => now - mtime.getTime())

    const evictOlderThan = (maxAge: number) =>
      Effect.gen(function*() {
        const now = yield* Clock.currentTimeMillis
        const names = yield* listEntries
        let removed = 0
        for (const name of names) {
          const path = Path.join(directory, name)
          const info = yield* statOption(path, "evict")
          if (Option.isNone(info) || info.value.type !== "File") continue
          const age = ageMillis(info.value, now)
          if (Option.isSome(age) && age.value > maxAge * 1000) {
            yield* removeQuietly(path, "evict")
            removed++
          }
        }
        yield* Effect.logDebug(`Cleaned ${removed} cache entries older than ${maxAge}s`)
        return removed
      })

    const evictAll = Effect.gen(function*() {
      const names = yield* listEntries
      for (const name of names) {
        yield* removeQuietly(Path.join(directory, name), "evict")
      }
      yield* Effect.logDebug(`Removed all ${names.length} cache entries`)
      return names.length
    })

    const initialize = yield* Effect.once(
      evictOlderThan(maxAgeSeconds).pipe(
        Effect.catchAll((error) => Effect.logDebug("Cache sweep skipped", error.message)),
        Effect.asVoid
      )
    )

    const lookup = (key: CacheKey, kind: EntryKind) =>
      Effect.gen(function*() {
        const path = Path.join(directory, entryFileName(key, kind))
        const info = yield* statOption(path, "lookup")
        if (Option.isNone(info) || info.value.type !== "File") return Option.none<EntryHandle>()
        if (kind === "executable" && (info.value.mode & 0o111) === 0) return Option.none<EntryHandle>()
        if (Option.isNone(info.value.mtime)) return Option.none<EntryHandle>()

        const modifiedAt = info.value.mtime.value
        const now = yield* Clock.currentTimeMillis
        if (now - modifiedAt.getTime() > maxAgeSeconds * 1000) {
          yield* Effect.logDebug("Cache expired", { key })
          yield* removeQuietly(path, "lookup")
          return Option.none<EntryHandle>()
        }

        return Option.some<EntryHandle>({ key, kind, path, modifiedAt })
      })

    const bundle = (root: string, files: ReadonlyArray<string>) =>
      Effect.gen(function*() {
        const zip = new JSZip()
        for (const file of files) {
          const bytes = yield* fs.readFile(Path.join(root, file))
          zip.file(file.split(Path.sep).join("/"), bytes)
        }
        return yield* Effect.tryPromise(() =>
          zip.generateAsync({ type: "uint8array", compression: "DEFLATE", platform: "UNIX" })
        )
      })

    const store = (key: CacheKey, artifact: BuiltArtifact) =>
      Effect.gen(function*() {
        yield* resolveCacheDirectory
        const kind: EntryKind = artifact._tag === "Executable" ? "executable" : "archive"
        const finalPath = Path.join(directory, entryFileName(key, kind))
        const tempPath = Path.join(
          directory,
          `.${entryFileName(key, kind)}.${process.pid}-${randomBytes(4).toString("hex")}.tmp`
        )

        const write = artifact._tag === "Executable"
          ? fs.copyFile(artifact.path, tempPath).pipe(Effect.zipRight(fs.chmod(tempPath, 0o755)))
          : bundle(artifact.directory, artifact.files).pipe(Effect.flatMap((data) => fs.writeFile(tempPath, data)))

        yield* write.pipe(
          Effect.zipRight(fs.rename(tempPath, finalPath)),
          Effect.mapError(fail("store", finalPath)),
          Effect.tapError(() => removeQuietly(tempPath, "store").pipe(Effect.ignore))
        )

        const info = yield* statOption(finalPath, "store")
        const now = yield* Clock.currentTimeMillis
        const modifiedAt = Option.getOrElse(Option.flatMap(info, (i) => i.mtime), () => new Date(now))
        yield* Effect.logDebug("Saved artifact to cache", { path: finalPath })
        return { key, kind, path: finalPath, modifiedAt }
      })

    const restore = (handle: EntryHandle, target: string) =>
      Effect.gen(function*() {
        const data = yield* fs.readFile(handle.path)
        const zip = yield* Effect.tryPromise(() => JSZip.loadAsync(data))
        const restored: Array<string> = []
        for (const entry of Object.values(zip.files)) {
          if (entry.dir) continue
          if (!isSafeMember(entry.name)) {
            return yield* Effect.fail(new Error(`unsafe archive member ${entry.name}`))
          }
          const destination = Path.join(target, ...entry.name.split("/"))
          const bytes = yield* Effect.tryPromise(() => entry.async("uint8array"))
          yield* fs.makeDirectory(Path.dirname(destination), { recursive: true })
          yield* fs.writeFile(destination, bytes)
          restored.push(Path.join(...entry.name.split("/")))
        }
        return restored.sort()
      }).pipe(Effect.mapError(fail("restore", handle.path)))

    return {
      directory,
      maxAgeSeconds,
      resolveCacheDirectory,
      initialize,
      lookup,
      store,
      restore,
      evictOlderThan,
      evictAll
    } satisfies CacheStoreInterface
  })

export class CacheStore extends Context.Tag("@ucode/CacheStore")<
  CacheStore,
  CacheStoreInterface
>() {
  /** Store at the configured (or XDG) location with the configured retention */
  static readonly layer: Layer.Layer<CacheStore, never, AppConfig | FileSystem.FileSystem> = Layer.effect(
    CacheStore,
    Effect.gen(function*() {
      const config = yield* AppConfig
      return yield* makeCacheStore({ directory: resolveCacheDir(config), maxAgeSeconds: config.cacheMaxAge })
    })
  )

  static at(options: CacheStoreOptions): Layer.Layer<CacheStore, never, FileSystem.FileSystem> {
    return Layer.effect(CacheStore, makeCacheStore(options))
  }
}
