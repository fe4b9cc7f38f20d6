/**
 * CLI End-to-End Tests
 *
 * Runs the real entry point through tsx in a scratch project, with the fake
 * toolchain as the language table and a private cache directory.
 */
import { Command, FileSystem } from "@effect/platform"
import { NodeContext } from "@effect/platform-node"
import { describe, expect, it } from "@effect/vitest"
import { Effect, Stream } from "effect"
import * as Path from "node:path"
import { fileURLToPath } from "node:url"
import { makeToolchain } from "./fixtures.ts"

const CLI_PATH = fileURLToPath(new URL("../src/cli/main.ts", import.meta.url))
const TSX_PATH = fileURLToPath(new URL("../node_modules/.bin/tsx", import.meta.url))

interface CliResult {
  readonly stdout: string
  readonly stderr: string
  readonly exitCode: number
}

/** Scratch project with a language table naming the fake compilers */
const setup = Effect.gen(function*() {
  const fs = yield* FileSystem.FileSystem
  const toolchain = yield* makeToolchain
  const project = Path.join(toolchain.dir, "project")
  yield* fs.makeDirectory(project)
  const cacheDir = Path.join(toolchain.dir, "cache")
  const table = Path.join(toolchain.dir, "languages.yaml")
  yield* fs.writeFileString(
    table,
    [
      "languages:",
      "  - extension: fk",
      "    name: Fake",
      "    strategy: Compile",
      `    compilerCommand: ${toolchain.compiler}`,
      "  - extension: jv",
      "    name: FakeJava",
      "    strategy: CompileToRuntimeArtifact",
      `    compilerCommand: ${toolchain.bytecodeCompiler}`,
      `    runnerCommand: ${toolchain.bytecodeRunner}`,
      "    compileArgs: [-d, \"{outDir}\", \"{source}\"]",
      "    runArgs: [\"{artifactDir}\", \"{mainName}\"]",
      "    artifactExtension: cls",
      "  - extension: sh",
      "    name: Shell",
      "    strategy: Direct",
      "    runnerCommand: sh",
      ""
    ].join("\n")
  )

  const env = {
    UCODE_LANGUAGES_FILE: table,
    UCODE_CACHE_DIR: cacheDir,
    UCODE_LANGUAGE: "en",
    FORCE_COLOR: "0"
  }

  const runUcode = (...args: Array<string>) =>
    Effect.scoped(
      Effect.gen(function*() {
        const child = yield* Command.make(TSX_PATH, CLI_PATH, ...args).pipe(
          Command.workingDirectory(project),
          Command.env(env),
          Command.feed(""),
          Command.start
        )
        const [stdout, stderr, exitCode] = yield* Effect.all([
          child.stdout.pipe(Stream.decodeText(), Stream.mkString),
          child.stderr.pipe(Stream.decodeText(), Stream.mkString),
          child.exitCode
        ], { concurrency: "unbounded" })
        return { stdout, stderr, exitCode: Number(exitCode) } satisfies CliResult
      })
    )

  const write = (name: string, content: string) => fs.writeFileString(Path.join(project, name), content)

  return { cacheDir, project, runUcode, write }
})

describe("CLI", () => {
  it.scopedLive("lists the supported extensions", () =>
    Effect.gen(function*() {
      const { runUcode } = yield* setup
      const result = yield* runUcode("--list")
      expect(result.exitCode).toBe(0)
      expect(result.stdout).toBe("Supported extensions: .fk .jv .sh\n")
    }).pipe(Effect.provide(NodeContext.layer)), { timeout: 30000 })

  it.scopedLive("compiles, runs and then reuses the cached build", () =>
    Effect.gen(function*() {
      const { runUcode, write } = yield* setup
      yield* write("hello.fk", "echo hello from the cli\n")

      const first = yield* runUcode("--ascii", "hello.fk")
      expect(first.exitCode).toBe(0)
      expect(first.stdout).toContain("> Compiling...")
      expect(first.stdout).toContain("| hello from the cli\n")

      const second = yield* runUcode("--ascii", "hello.fk")
      expect(second.exitCode).toBe(0)
      expect(second.stdout).toContain("> Using cached build\n")
      expect(second.stdout).not.toContain("Compiling")
    }).pipe(Effect.provide(NodeContext.layer)), { timeout: 60000 })

  it.scopedLive("finds the newest source file when none is named", () =>
    Effect.gen(function*() {
      const { runUcode, write } = yield* setup
      yield* write("script.sh", "echo discovered $1\n")

      const result = yield* runUcode("--ascii", "first")
      expect(result.exitCode).toBe(0)
      expect(result.stdout).toContain("> Detected Shell (script.sh)\n")
      expect(result.stdout).toContain("| discovered first\n")
    }).pipe(Effect.provide(NodeContext.layer)), { timeout: 30000 })

  it.scopedLive("exits with the program's exit code", () =>
    Effect.gen(function*() {
      const { runUcode, write } = yield* setup
      yield* write("fail.sh", "exit 3\n")

      const result = yield* runUcode("--ascii", "fail.sh")
      expect(result.exitCode).toBe(3)
      expect(result.stdout).toContain("[FAIL] Exited with code 3 after ")
    }).pipe(Effect.provide(NodeContext.layer)), { timeout: 30000 })

  it.scopedLive("exits with 124 when the timeout passes", () =>
    Effect.gen(function*() {
      const { runUcode, write } = yield* setup
      yield* write("slow.sh", "echo waiting\nsleep 10\n")

      const result = yield* runUcode("--ascii", "--timeout", "1", "slow.sh")
      expect(result.exitCode).toBe(124)
      expect(result.stdout).toContain("| waiting\n")
      expect(result.stdout).toContain("[TIMEOUT] Timed out after 1s\n")
    }).pipe(Effect.provide(NodeContext.layer)), { timeout: 30000 })

  it.scopedLive("shows compiler diagnostics and exits with 1", () =>
    Effect.gen(function*() {
      const { project, runUcode, write } = yield* setup
      yield* write("broken.fk", "SYNTAX ERROR\n")

      const result = yield* runUcode("--ascii", "broken.fk")
      expect(result.exitCode).toBe(1)
      expect(result.stdout).toContain(`| ${Path.join(project, "broken.fk")}:1: error: bad syntax\n`)
      expect(result.stdout).toContain("[FAIL] Compilation failed\n")
    }).pipe(Effect.provide(NodeContext.layer)), { timeout: 30000 })

  it.scopedLive("rejects a limit out of range", () =>
    Effect.gen(function*() {
      const { runUcode, write } = yield* setup
      yield* write("hello.sh", "echo hi\n")

      const result = yield* runUcode("--timeout", "9999", "hello.sh")
      expect(result.exitCode).toBe(1)
      expect(result.stderr).toContain("Error: --timeout must be between 0 and 3600, got 9999\n")
    }).pipe(Effect.provide(NodeContext.layer)), { timeout: 30000 })

  it.scopedLive("rejects a file in an unsupported language", () =>
    Effect.gen(function*() {
      const { runUcode, write } = yield* setup
      yield* write("notes.txt", "just text\n")

      const result = yield* runUcode("notes.txt")
      expect(result.exitCode).toBe(1)
      expect(result.stderr).toContain("Error: Unsupported file type: .txt. Supported types are: .fk .jv .sh\n")
    }).pipe(Effect.provide(NodeContext.layer)), { timeout: 30000 })

  it.scopedLive("empties the cache on --clean-cache", () =>
    Effect.gen(function*() {
      const { cacheDir, runUcode, write } = yield* setup
      yield* write("hello.fk", "echo cached\n")
      yield* runUcode("hello.fk")

      const result = yield* runUcode("--clean-cache")
      expect(result.exitCode).toBe(0)
      expect(result.stdout).toBe(`Removed 1 cache entries from ${cacheDir}\n`)
    }).pipe(Effect.provide(NodeContext.layer)), { timeout: 60000 })
})
