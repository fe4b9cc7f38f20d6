/**
 * Logging Module
 *
 * Console logging goes to stderr so diagnostics never interleave with the
 * program output shown on stdout. An optional JSON file log gets its own level.
 */
import { FileSystem, PlatformLogger } from "@effect/platform"
import { NodeContext } from "@effect/platform-node"
import { Console, Effect, Layer, Logger, LogLevel, Option } from "effect"
import * as Path from "node:path"

// =============================================================================
// Logging Configuration
// =============================================================================

export interface LoggingConfig {
  readonly stderrLevel: LogLevel.LogLevel
  readonly fileLogPath: Option.Option<string>
  readonly fileLogLevel: LogLevel.LogLevel
  readonly baseDir: string
}

// =============================================================================
// Logger Creation
// =============================================================================

const stderrLogger = (level: LogLevel.LogLevel) =>
  level === LogLevel.None
    ? Logger.none
    : Logger.filterLogLevel(
      Logger.prettyLogger({ stderr: true }),
      (l) => LogLevel.greaterThanEqual(l, level)
    )

/**
 * Create a logging layer based on configuration.
 *
 * If file logging fails to initialize, falls back to stderr-only logging.
 */
export const createLoggingLayer = (config: LoggingConfig): Layer.Layer<never> => {
  const consoleLogger = stderrLogger(config.stderrLevel)

  if (Option.isNone(config.fileLogPath) || config.fileLogLevel === LogLevel.None) {
    return Layer.merge(
      Logger.replace(Logger.defaultLogger, consoleLogger),
      Logger.minimumLogLevel(config.stderrLevel)
    )
  }

  const filePath = config.fileLogPath.value
  const resolvedPath = Path.isAbsolute(filePath)
    ? filePath
    : Path.join(config.baseDir, filePath)

  const fileLoggerEffect = Effect.gen(function*() {
    const fs = yield* FileSystem.FileSystem

    yield* fs.makeDirectory(Path.dirname(resolvedPath), { recursive: true }).pipe(
      Effect.catchAll(() => Effect.void)
    )

    return yield* Logger.jsonLogger.pipe(
      PlatformLogger.toFile(resolvedPath, { flag: "a", batchWindow: "100 millis" })
    )
  })

  const combinedLoggerEffect = Effect.map(fileLoggerEffect, (fileLogger) => {
    const filteredFile = Logger.filterLogLevel(
      fileLogger,
      (level) => LogLevel.greaterThanEqual(level, config.fileLogLevel)
    )
    return Logger.zipRight(consoleLogger, Logger.map(filteredFile, () => undefined))
  })

  // The fiber-level minimum defaults to Info; open it up to the most verbose sink
  const minimumLevel = LogLevel.lessThan(config.fileLogLevel, config.stderrLevel)
    ? config.fileLogLevel
    : config.stderrLevel

  return Logger.replaceScoped(Logger.defaultLogger, combinedLoggerEffect).pipe(
    Layer.provide(NodeContext.layer),
    Layer.merge(Logger.minimumLogLevel(minimumLevel)),
    Layer.catchAll((error) =>
      Layer.effectDiscard(Console.error(`File logging failed, using stderr only: ${error}`)).pipe(
        Layer.merge(Logger.replace(Logger.defaultLogger, consoleLogger)),
        Layer.merge(Logger.minimumLogLevel(config.stderrLevel))
      )
    )
  )
}
