/**
 * Highlighter - terminal syntax coloring of program output.
 *
 * Pipes the text through the first installed of pygmentize, highlight and
 * bat. A missing tool, a failing tool or empty output leaves the text as it
 * was.
 */
import { Command, CommandExecutor, FileSystem } from "@effect/platform"
import { Context, Effect, Layer, Option, Stream } from "effect"
import { resolveExecutable } from "./toolchain.ts"

/** In order of preference */
export const HIGHLIGHTERS = ["pygmentize", "highlight", "bat"] as const
export type HighlighterTool = (typeof HIGHLIGHTERS)[number]

export interface DetectedHighlighter {
  readonly tool: HighlighterTool
  readonly path: string
}

/** Arguments that read stdin and write ANSI-colored text for `extension` */
export const highlighterArgs = (tool: HighlighterTool, extension: string): ReadonlyArray<string> => {
  switch (tool) {
    case "pygmentize":
      return ["-f", "terminal", "-l", extension]
    case "highlight":
      return [`--syntax=${extension}`, "--out-format=ansi"]
    case "bat":
      return ["--color=always", `--language=${extension}`, "--plain"]
  }
}

export const detectHighlighter = (pathEnv?: string) =>
  Effect.gen(function*() {
    for (const tool of HIGHLIGHTERS) {
      const path = yield* resolveExecutable(tool, { pathEnv }).pipe(Effect.option)
      if (Option.isSome(path)) return Option.some<DetectedHighlighter>({ tool, path: path.value })
    }
    return Option.none<DetectedHighlighter>()
  })

interface HighlighterInterface {
  readonly highlight: (text: string, extension: string) => Effect.Effect<string>
}

export class Highlighter extends Context.Tag("@ucode/Highlighter")<
  Highlighter,
  HighlighterInterface
>() {
  static readonly plain: Layer.Layer<Highlighter> = Layer.succeed(
    Highlighter,
    Highlighter.of({ highlight: (text) => Effect.succeed(text) })
  )

  /** The first highlighter found on `pathEnv` (PATH by default); plain when there is none */
  static fromPath(
    pathEnv?: string
  ): Layer.Layer<Highlighter, never, CommandExecutor.CommandExecutor | FileSystem.FileSystem> {
    return Layer.effect(
      Highlighter,
      Effect.gen(function*() {
        const executor = yield* CommandExecutor.CommandExecutor
        const detected = yield* detectHighlighter(pathEnv)
        if (Option.isNone(detected)) {
          yield* Effect.logDebug("No syntax highlighter installed")
          return Highlighter.of({ highlight: (text) => Effect.succeed(text) })
        }
        const { tool, path } = detected.value

        const run = (text: string, extension: string) =>
          Effect.scoped(
            Effect.gen(function*() {
              const process = yield* executor.start(
                Command.make(path, ...highlighterArgs(tool, extension)).pipe(Command.feed(text))
              )
              const [colored, exitCode] = yield* Effect.all([
                process.stdout.pipe(Stream.decodeText(), Stream.mkString),
                process.exitCode,
                process.stderr.pipe(Stream.runDrain)
              ], { concurrency: "unbounded" })
              return Number(exitCode) === 0 && colored !== "" ? colored : text
            })
          )

        const highlight = (text: string, extension: string) =>
          text === ""
            ? Effect.succeed(text)
            : run(text, extension).pipe(
              Effect.catchAll((error) =>
                Effect.logDebug(`${tool} failed, showing plain output`, error.message).pipe(Effect.as(text))
              )
            )

        return Highlighter.of({ highlight })
      })
    )
  }

  static readonly layer = Highlighter.fromPath()
}
