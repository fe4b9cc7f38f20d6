/**
 * Discovery Tests
 */
import { FileSystem } from "@effect/platform"
import { NodeContext } from "@effect/platform-node"
import { describe, expect, it } from "@effect/vitest"
import { Effect, Option } from "effect"
import * as Path from "node:path"
import {
  detectExtension,
  discover,
  extensionForInterpreter,
  parseShebang,
  splitInvocation,
  suffixExtension
} from "../src/discovery.ts"

const SUPPORTED = ["c", "py", "sh"]

/** A scratch directory with files written at fixed mtimes (seconds) */
const withFiles = (files: ReadonlyArray<{ readonly name: string; readonly content: string; readonly mtime: number }>) =>
  Effect.gen(function*() {
    const fs = yield* FileSystem.FileSystem
    const dir = yield* fs.makeTempDirectoryScoped({ prefix: "ucode-discover-" })
    for (const file of files) {
      const path = Path.join(dir, file.name)
      yield* fs.writeFileString(path, file.content)
      const time = new Date(file.mtime * 1000)
      yield* fs.utimes(path, time, time)
    }
    return dir
  })

describe("parseShebang", () => {
  it("reads the interpreter of a direct shebang", () => {
    expect(parseShebang("#!/bin/bash")).toEqual(Option.some("bash"))
    expect(parseShebang("#! /usr/bin/python3 -u")).toEqual(Option.some("python3"))
  })

  it("looks through env and its options", () => {
    expect(parseShebang("#!/usr/bin/env -S node --flag")).toEqual(Option.some("node"))
    expect(parseShebang("#!/usr/bin/env -u HOME DEBUG=1 python3")).toEqual(Option.some("python3"))
  })

  it("finds nothing without an interpreter", () => {
    expect(parseShebang("#!/usr/bin/env")).toEqual(Option.none())
    expect(parseShebang("#!")).toEqual(Option.none())
    expect(parseShebang("print('hi')")).toEqual(Option.none())
  })
})

describe("extensionForInterpreter", () => {
  it("maps interpreters to table extensions", () => {
    expect(extensionForInterpreter("python3")).toEqual(Option.some("py"))
    expect(extensionForInterpreter("ruby")).toEqual(Option.some("rb"))
    expect(extensionForInterpreter("nodejs")).toEqual(Option.some("js"))
  })

  it("ignores a version suffix", () => {
    expect(extensionForInterpreter("python3.12")).toEqual(Option.some("py"))
  })

  it("knows nothing about other programs", () => {
    expect(extensionForInterpreter("java")).toEqual(Option.none())
  })
})

describe("suffixExtension", () => {
  it("lowercases the suffix without its dot", () => {
    expect(suffixExtension("src/Main.CPP")).toBe("cpp")
    expect(suffixExtension("Makefile")).toBe("")
  })
})

describe("detectExtension", () => {
  it.scoped("prefers a recognized shebang over the suffix", () =>
    Effect.gen(function*() {
      const dir = yield* withFiles([{ name: "tool.txt", content: "#!/bin/bash\necho hi\n", mtime: 1000 }])
      expect(yield* detectExtension(Path.join(dir, "tool.txt"), SUPPORTED)).toBe("sh")
    }).pipe(Effect.provide(NodeContext.layer)))

  it.scoped("detects an extensionless script", () =>
    Effect.gen(function*() {
      const dir = yield* withFiles([{ name: "script", content: "#!/usr/bin/env python3\nprint(1)\n", mtime: 1000 }])
      expect(yield* detectExtension(Path.join(dir, "script"), SUPPORTED)).toBe("py")
    }).pipe(Effect.provide(NodeContext.layer)))

  it.scoped("falls back to the suffix when the shebang language is unsupported", () =>
    Effect.gen(function*() {
      const dir = yield* withFiles([{ name: "run.sh", content: "#!/usr/bin/env ruby\nputs 1\n", mtime: 1000 }])
      expect(yield* detectExtension(Path.join(dir, "run.sh"), SUPPORTED)).toBe("sh")
    }).pipe(Effect.provide(NodeContext.layer)))

  it.scoped("reads only the head of a large file", () =>
    Effect.gen(function*() {
      const body = "#!/usr/bin/env python3\n" + "x = 1\n".repeat(400_000)
      const dir = yield* withFiles([{ name: "big", content: body, mtime: 1000 }])
      expect(yield* detectExtension(Path.join(dir, "big"), SUPPORTED)).toBe("py")
    }).pipe(Effect.provide(NodeContext.layer)))

  it.scoped("gives an extensionless binary no extension", () =>
    Effect.gen(function*() {
      const fs = yield* FileSystem.FileSystem
      const dir = yield* fs.makeTempDirectoryScoped({ prefix: "ucode-discover-" })
      const path = Path.join(dir, "blob")
      yield* fs.writeFile(path, new Uint8Array(4096).fill(0xff))
      expect(yield* detectExtension(path, SUPPORTED)).toBe("")
    }).pipe(Effect.provide(NodeContext.layer)))
})

describe("splitInvocation", () => {
  it.scoped("takes a first positional with a supported suffix as the file", () =>
    Effect.gen(function*() {
      const dir = yield* withFiles([])
      const split = yield* splitInvocation(dir, ["main.c", "x", "y"], SUPPORTED)
      expect(split).toEqual({ explicit: Option.some("main.c"), args: ["x", "y"] })
    }).pipe(Effect.provide(NodeContext.layer)))

  it.scoped("takes an existing file without a suffix as the file", () =>
    Effect.gen(function*() {
      const dir = yield* withFiles([{ name: "script", content: "#!/bin/sh\n", mtime: 1000 }])
      const split = yield* splitInvocation(dir, ["script", "a"], SUPPORTED)
      expect(split).toEqual({ explicit: Option.some("script"), args: ["a"] })
    }).pipe(Effect.provide(NodeContext.layer)))

  it.scoped("gives every positional to the program otherwise", () =>
    Effect.gen(function*() {
      const dir = yield* withFiles([])
      const split = yield* splitInvocation(dir, ["alpha", "beta"], SUPPORTED)
      expect(split).toEqual({ explicit: Option.none(), args: ["alpha", "beta"] })
    }).pipe(Effect.provide(NodeContext.layer)))
})

describe("discover", () => {
  it.scoped("picks the most recently modified supported file", () =>
    Effect.gen(function*() {
      const dir = yield* withFiles([
        { name: "old.py", content: "print(1)\n", mtime: 1000 },
        { name: "new.c", content: "int main(void) { return 0; }\n", mtime: 2000 },
        { name: "newest.txt", content: "notes\n", mtime: 3000 }
      ])
      const file = yield* discover(dir, Option.none(), SUPPORTED)
      expect(file).toEqual({ path: Path.join(dir, "new.c"), extension: "c" })
    }).pipe(Effect.provide(NodeContext.layer)))

  it.scoped("breaks mtime ties by name", () =>
    Effect.gen(function*() {
      const dir = yield* withFiles([
        { name: "b.py", content: "print(2)\n", mtime: 1000 },
        { name: "a.py", content: "print(1)\n", mtime: 1000 }
      ])
      const file = yield* discover(dir, Option.none(), SUPPORTED)
      expect(file.path).toBe(Path.join(dir, "a.py"))
    }).pipe(Effect.provide(NodeContext.layer)))

  it.scoped("considers extensionless scripts by their shebang", () =>
    Effect.gen(function*() {
      const dir = yield* withFiles([
        { name: "main.c", content: "int main(void) { return 0; }\n", mtime: 1000 },
        { name: "deploy", content: "#!/bin/sh\necho deploy\n", mtime: 2000 },
        { name: "LICENSE", content: "plain text\n", mtime: 3000 }
      ])
      const file = yield* discover(dir, Option.none(), SUPPORTED)
      expect(file).toEqual({ path: Path.join(dir, "deploy"), extension: "sh" })
    }).pipe(Effect.provide(NodeContext.layer)))

  it.scoped("fails when nothing in the directory is runnable", () =>
    Effect.gen(function*() {
      const dir = yield* withFiles([{ name: "README.md", content: "# hi\n", mtime: 1000 }])
      const error = yield* discover(dir, Option.none(), SUPPORTED).pipe(Effect.flip)
      expect(error.path).toBe("")
      expect(error.message).toBe("No supported code files found. Supported extensions: .c .py .sh")
    }).pipe(Effect.provide(NodeContext.layer)))

  it.scoped("resolves an explicit file against the directory", () =>
    Effect.gen(function*() {
      const dir = yield* withFiles([{ name: "hello.py", content: "print(1)\n", mtime: 1000 }])
      const file = yield* discover(dir, Option.some("hello.py"), SUPPORTED)
      expect(file).toEqual({ path: Path.join(dir, "hello.py"), extension: "py" })
    }).pipe(Effect.provide(NodeContext.layer)))

  it.scoped("reports an explicit file that does not exist", () =>
    Effect.gen(function*() {
      const dir = yield* withFiles([])
      const error = yield* discover(dir, Option.some("nope.c"), SUPPORTED).pipe(Effect.flip)
      expect(error.message).toBe("File not found: nope.c")
    }).pipe(Effect.provide(NodeContext.layer)))
})
