/**
 * Test Fixtures
 *
 * Fake toolchains written as POSIX sh scripts at test time, so the suites need
 * no installed compilers. Every fixture lives in a scoped temp directory.
 */
import { FileSystem } from "@effect/platform"
import { Effect, Option } from "effect"
import * as Path from "node:path"
import { LanguageSpec } from "../src/domain.ts"
import type { ResourceLimits, RunOptions } from "../src/domain.ts"

/**
 * "Compiles" a shell program by copying it behind a shebang. Appends its argv
 * to `<compiler>.log` on every run. Sources containing SYNTAX ERROR fail;
 * sources containing NO OUTPUT exit 0 without writing the binary.
 */
export const FAKE_COMPILER = `#!/bin/sh
echo "$*" >> "$0.log"
out=""
src=""
while [ $# -gt 0 ]; do
  case "$1" in
    -o) out="$2"; shift 2 ;;
    -*) shift ;;
    *) src="$1"; shift ;;
  esac
done
if grep -q "SYNTAX ERROR" "$src"; then
  echo "$src:1: error: bad syntax" >&2
  exit 1
fi
if grep -q "NO OUTPUT" "$src"; then
  echo "warning: nothing to emit"
  exit 0
fi
{ echo '#!/bin/sh'; cat "$src"; } > "$out"
chmod +x "$out"
`

/** Writes `<name>.cls` plus `lib/Helper.cls` into the -d directory */
export const FAKE_BYTECODE_COMPILER = `#!/bin/sh
echo "$*" >> "$0.log"
dir=""
src=""
while [ $# -gt 0 ]; do
  case "$1" in
    -d) dir="$2"; shift 2 ;;
    -*) shift ;;
    *) src="$1"; shift ;;
  esac
done
if grep -q "NO OUTPUT" "$src"; then
  exit 0
fi
name=$(basename "$src" .jv)
mkdir -p "$dir/lib"
cp "$src" "$dir/$name.cls"
echo 'echo helper' > "$dir/lib/Helper.cls"
`

/** Runs `<artifactDir>/<mainName>.cls` with the remaining arguments */
export const FAKE_BYTECODE_RUNNER = `#!/bin/sh
dir="$1"
main="$2"
shift 2
exec sh "$dir/$main.cls" "$@"
`

export const writeExecutable = (path: string, content: string) =>
  Effect.gen(function*() {
    const fs = yield* FileSystem.FileSystem
    yield* fs.writeFileString(path, content)
    yield* fs.chmod(path, 0o755)
    return path
  })

export interface Toolchain {
  readonly dir: string
  readonly compiler: string
  readonly bytecodeCompiler: string
  readonly bytecodeRunner: string
  readonly specs: ReadonlyArray<LanguageSpec>
}

/** A scratch directory holding the fake toolchain and its language table */
export const makeToolchain = Effect.gen(function*() {
  const fs = yield* FileSystem.FileSystem
  const dir = yield* fs.makeTempDirectoryScoped({ prefix: "ucode-test-" })
  const compiler = yield* writeExecutable(Path.join(dir, "fakecc"), FAKE_COMPILER)
  const bytecodeCompiler = yield* writeExecutable(Path.join(dir, "fakejavac"), FAKE_BYTECODE_COMPILER)
  const bytecodeRunner = yield* writeExecutable(Path.join(dir, "fakejava"), FAKE_BYTECODE_RUNNER)

  const specs = [
    new LanguageSpec({
      extension: "fk",
      name: "Fake",
      strategy: "Compile",
      compilerCommand: compiler,
      flagsEnvVar: "FAKEFLAGS",
      defaultFlags: "-O1"
    }),
    new LanguageSpec({
      extension: "jv",
      name: "FakeJava",
      strategy: "CompileToRuntimeArtifact",
      compilerCommand: bytecodeCompiler,
      runnerCommand: bytecodeRunner,
      compileArgs: ["{flags}", "-d", "{outDir}", "{source}"],
      runArgs: ["{artifactDir}", "{mainName}"],
      artifactExtension: "cls"
    }),
    new LanguageSpec({
      extension: "sh",
      name: "Shell",
      strategy: "Direct",
      runnerCommand: "sh"
    })
  ]

  return { dir, compiler, bytecodeCompiler, bytecodeRunner, specs } satisfies Toolchain
})

/** Lines the fake compiler appended to its log, i.e. how often it ran */
export const compilerRuns = (compiler: string) =>
  Effect.gen(function*() {
    const fs = yield* FileSystem.FileSystem
    const log = `${compiler}.log`
    if (!(yield* fs.exists(log))) return 0
    const content = yield* fs.readFileString(log)
    return content.split("\n").filter((line) => line !== "").length
  })

export const testLimits: ResourceLimits = {
  timeoutMs: 0,
  memoryLimitBytes: 0,
  sandbox: false,
  killGraceMs: 500
}

export const makeRunOptions = (workingDirectory: string, overrides: Partial<RunOptions> = {}): RunOptions => ({
  args: [],
  workingDirectory,
  limits: testLimits,
  cacheEnabled: true,
  stdin: "ignore",
  flagOverrides: {},
  ...overrides
})
