/**
 * CLI Commands
 *
 * `ucode [options] [file] [args...]`
 */
import { Args, Command, Options } from "@effect/cli"
import { Effect, Layer, Option } from "effect"
import { Builder } from "../builder.ts"
import { CacheStore } from "../cache-store.ts"
import { AppConfig, resolveMessageLanguage } from "../config.ts"
import type { RunOptions } from "../domain.ts"
import { discover, splitInvocation } from "../discovery.ts"
import { OptionValidationError } from "../errors.ts"
import { Executor } from "../executor.ts"
import { Highlighter } from "../highlighter.ts"
import { LanguageRegistry } from "../language-registry.ts"
import { makeMessages, Messages } from "../messages.ts"
import { Orchestrator } from "../orchestrator.ts"
import { RunReporter } from "../reporter.ts"
import { SandboxDetector } from "../sandbox/index.ts"
import { collectFlagOverrides } from "../toolchain.ts"
import { renderError } from "./error.ts"

// =============================================================================
// Options
// =============================================================================

const timeoutOption = Options.integer("timeout").pipe(
  Options.withAlias("t"),
  Options.withDescription("Wall-clock limit in seconds (0-3600, 0 = none)"),
  Options.optional
)

const memoryOption = Options.integer("memory").pipe(
  Options.withAlias("m"),
  Options.withDescription("Memory limit in MB (0-4096, 0 = none; needs --sandbox)"),
  Options.optional
)

const sandboxOption = Options.boolean("sandbox").pipe(
  Options.withAlias("s"),
  Options.withDescription("Run inside firejail, nsjail, bubblewrap or systemd-run when available")
)

const noCacheOption = Options.boolean("no-cache").pipe(
  Options.withAlias("n"),
  Options.withDescription("Always compile; neither read nor write the build cache")
)

const cleanCacheOption = Options.boolean("clean-cache").pipe(
  Options.withDescription("Remove every cached build and exit")
)

// Read before the command runs to pick the log level; declared so it parses
const verboseOption = Options.boolean("verbose").pipe(
  Options.withAlias("v"),
  Options.withDescription("Debug logging on stderr")
)

const asciiOption = Options.boolean("ascii").pipe(
  Options.withAlias("a"),
  Options.withDescription("Draw boxes with ASCII characters")
)

const langOption = Options.choice("lang", ["en", "zh"]).pipe(
  Options.withDescription("Message language (default from LANG)"),
  Options.optional
)

// Read before the command runs to build the config provider; declared so it parses
export const configFileOption = Options.file("config").pipe(
  Options.withAlias("c"),
  Options.withDescription("Path to YAML config file"),
  Options.optional
)

const listOption = Options.boolean("list").pipe(
  Options.withDescription("List supported file extensions and exit")
)

const positionalArgs = Args.text({ name: "file-and-args" }).pipe(
  Args.withDescription("Source file (optional), then the program's arguments"),
  Args.repeated
)

// =============================================================================
// Handler
// =============================================================================

const withinRange = (option: string, value: number, min: number, max: number) =>
  value >= min && value <= max
    ? Effect.succeed(value)
    : Effect.fail(new OptionValidationError({ option, value, min, max }))

const MIB = 1024 * 1024

const ucodeCommand = Command.make(
  "ucode",
  {
    timeout: timeoutOption,
    memory: memoryOption,
    sandbox: sandboxOption,
    noCache: noCacheOption,
    cleanCache: cleanCacheOption,
    verbose: verboseOption,
    ascii: asciiOption,
    lang: langOption,
    config: configFileOption,
    list: listOption,
    positionals: positionalArgs
  },
  (opts) =>
    Effect.gen(function*() {
      const config = yield* AppConfig
      const language = Option.getOrElse(opts.lang, () => resolveMessageLanguage(config.language))
      const messages = makeMessages(language)

      const servicesLayer = Orchestrator.layer.pipe(
        Layer.provideMerge(Layer.mergeAll(
          LanguageRegistry.layer,
          CacheStore.layer,
          Builder.layer,
          Executor.layer.pipe(Layer.provide(SandboxDetector.layer)),
          RunReporter.console({ ascii: opts.ascii || config.ascii }).pipe(
            Layer.provide(Messages.layer(language)),
            // Colored output only makes sense on a terminal
            Layer.provide(process.stdout.isTTY ? Highlighter.layer : Highlighter.plain)
          )
        ))
      )

      const program = Effect.gen(function*() {
        const registry = yield* LanguageRegistry
        const reporter = yield* RunReporter
        const orchestrator = yield* Orchestrator

        if (opts.list) {
          return yield* reporter.extensions(registry.extensions)
        }
        if (opts.cleanCache) {
          const cache = yield* CacheStore
          const removed = yield* orchestrator.cleanCache
          return yield* reporter.cacheCleared(removed, cache.directory)
        }

        const timeout = yield* withinRange("--timeout", Option.getOrElse(opts.timeout, () => config.timeout), 0, 3600)
        const memory = yield* withinRange("--memory", Option.getOrElse(opts.memory, () => config.memory), 0, 4096)

        const cwd = process.cwd()
        const { args, explicit } = yield* splitInvocation(cwd, opts.positionals, registry.extensions)
        const source = yield* discover(cwd, explicit, registry.extensions)

        const flagVariables = registry.languages.flatMap((spec) =>
          spec.flagsEnvVar === undefined ? [] : [spec.flagsEnvVar]
        )
        const runOptions: RunOptions = {
          args,
          workingDirectory: cwd,
          limits: {
            timeoutMs: timeout * 1000,
            memoryLimitBytes: memory * MIB,
            sandbox: opts.sandbox || config.sandbox,
            killGraceMs: config.killGraceMs
          },
          cacheEnabled: !(opts.noCache || config.noCache),
          stdin: "inherit",
          flagOverrides: collectFlagOverrides(flagVariables, process.env)
        }

        const report = yield* orchestrator.run(source, runOptions)
        yield* reporter.report(report)
        yield* Effect.sync(() => {
          process.exitCode = report.exitCode
        })
      })

      yield* program.pipe(
        Effect.provide(servicesLayer),
        Effect.catchAll((error) => renderError(error, messages.t))
      )
    })
).pipe(Command.withDescription("Detect a source file's language, build it (cached) and run it"))

export const cli = Command.run(ucodeCommand, {
  name: "ucode",
  version: "1.0.0"
})
