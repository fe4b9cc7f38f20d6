#!/usr/bin/env -S npx tsx
/**
 * Main Entry Point
 */
import { ValidationError } from "@effect/cli"
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect, Layer, LogLevel } from "effect"
import {
  AppConfig,
  extractConfigPath,
  extractVerbose,
  makeConfigProvider,
  resolveMessageLanguage,
  UcodeConfig
} from "../config.ts"
import { createLoggingLayer } from "../logging.ts"
import { makeMessages } from "../messages.ts"
import { cli } from "./commands.ts"
import { renderError, teardown } from "./error.ts"

const makeMainLayer = (args: ReadonlyArray<string>) =>
  Layer.unwrapEffect(
    Effect.gen(function*() {
      const configPath = extractConfigPath(args)
      const configProvider = yield* makeConfigProvider(configPath)
      const config = yield* UcodeConfig.pipe(Effect.withConfigProvider(configProvider))

      const loggingLayer = createLoggingLayer({
        stderrLevel: extractVerbose(args) ? LogLevel.Debug : config.logLevel,
        fileLogPath: config.logFile,
        fileLogLevel: LogLevel.Debug,
        baseDir: process.cwd()
      })

      return Layer.mergeAll(
        AppConfig.fromConfig(config),
        Layer.setConfigProvider(configProvider),
        loggingLayer
      )
    }).pipe(
      Effect.provide(NodeContext.layer)
    )
  )

const args = process.argv.slice(2)

cli(process.argv).pipe(
  Effect.provide(makeMainLayer(args)),
  Effect.provide(NodeContext.layer),
  Effect.catchAll((error) =>
    // @effect/cli has already printed usage problems
    ValidationError.isValidationError(error)
      ? Effect.sync(() => {
        process.exitCode = 1
      })
      : renderError(error, makeMessages(resolveMessageLanguage("auto")).t)
  ),
  (effect) => NodeRuntime.runMain(effect, { disablePrettyLogger: true, teardown })
)
