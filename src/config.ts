/**
 * Configuration Module
 *
 * Precedence: CLI options → UCODE_* environment variables → YAML config file → Defaults
 *
 * CLI options are merged by the command handler (they are typed by @effect/cli);
 * this module composes the remaining providers.
 */
import { FileSystem } from "@effect/platform"
import { Config, ConfigProvider, Context, Effect, Layer, LogLevel, Option } from "effect"
import * as os from "node:os"
import * as Path from "node:path"
import * as yaml from "yaml"

export const DEFAULT_CONFIG_FILE = "ucode.config.yaml"

/** Create a ConfigProvider from a YAML config file. Returns empty if file doesn't exist. */
export const fromYamlFile = (path: string) =>
  Effect.gen(function*() {
    const fs = yield* FileSystem.FileSystem
    const exists = yield* fs.exists(path)
    if (!exists) return ConfigProvider.fromMap(new Map())
    const content = yield* fs.readFileString(path)
    const parsed = yield* Effect.try({
      try: (): unknown => yaml.parse(content),
      catch: (cause) => new Error(`Invalid YAML in ${path}`, { cause })
    })
    if (typeof parsed !== "object" || parsed === null) return ConfigProvider.fromMap(new Map())
    return ConfigProvider.fromJson(parsed)
  })

/** Create composed ConfigProvider: env (UCODE_ prefix) → YAML → defaults */
export const makeConfigProvider = (configPath: string) =>
  Effect.gen(function*() {
    const yamlProvider = yield* fromYamlFile(configPath)
    const envProvider = ConfigProvider.fromEnv().pipe(ConfigProvider.nested("UCODE"))
    const defaultsProvider = ConfigProvider.fromMap(
      new Map([
        ["TIMEOUT", "0"],
        ["MEMORY", "0"],
        ["LOG_LEVEL", "warning"]
      ])
    )

    return envProvider.pipe(
      ConfigProvider.orElse(() => yamlProvider),
      ConfigProvider.orElse(() => defaultsProvider)
    )
  })

const logLevelConfig = (name: string) =>
  Config.string(name).pipe(
    Config.map((s): LogLevel.LogLevel => {
      const level = s.toLowerCase()
      if (level === "none" || level === "off") return LogLevel.None
      const literalMap: Record<string, LogLevel.Literal> = {
        trace: "Trace",
        debug: "Debug",
        info: "Info",
        warn: "Warning",
        warning: "Warning",
        error: "Error",
        fatal: "Fatal"
      }
      const literal = literalMap[level]
      if (!literal) return LogLevel.Warning
      return LogLevel.fromLiteral(literal)
    })
  )

const boundedInteger = (name: string, min: number, max: number) =>
  Config.integer(name).pipe(
    Config.validate({
      message: `${name} must be an integer between ${min} and ${max}`,
      validation: (n) => n >= min && n <= max
    })
  )

export const MessageLanguage = Config.literal("en", "zh", "auto")

export const UcodeConfig = Config.all({
  // Seconds, 0 = unbounded
  timeout: boundedInteger("TIMEOUT", 0, 3600).pipe(Config.withDefault(0)),
  // Megabytes, 0 = unbounded
  memory: boundedInteger("MEMORY", 0, 4096).pipe(Config.withDefault(0)),
  sandbox: Config.boolean("SANDBOX").pipe(Config.withDefault(false)),
  noCache: Config.boolean("NO_CACHE").pipe(Config.withDefault(false)),

  cacheDir: Config.string("CACHE_DIR").pipe(Config.option),
  // Seconds; entries older than this are evicted (7 days)
  cacheMaxAge: Config.integer("CACHE_MAX_AGE").pipe(
    Config.validate({ message: "CACHE_MAX_AGE must not be negative", validation: (n) => n >= 0 }),
    Config.withDefault(604800)
  ),
  killGraceMs: Config.integer("KILL_GRACE_MS").pipe(Config.withDefault(2000)),

  logLevel: logLevelConfig("LOG_LEVEL").pipe(Config.withDefault(LogLevel.Warning)),
  logFile: Config.string("LOG_FILE").pipe(Config.option),

  language: MessageLanguage("LANGUAGE").pipe(Config.withDefault("auto" as const)),
  ascii: Config.boolean("ASCII").pipe(Config.withDefault(false)),

  // Alternate language table (YAML); the bundled one is used when unset
  languagesFile: Config.string("LANGUAGES_FILE").pipe(Config.option)
})

export type UcodeConfig = Config.Config.Success<typeof UcodeConfig>

export class AppConfig extends Context.Tag("@ucode/AppConfig")<
  AppConfig,
  UcodeConfig
>() {
  static readonly layer = Layer.effect(
    AppConfig,
    Effect.gen(function*() {
      const config = yield* UcodeConfig
      return config
    })
  )

  static fromConfig(config: UcodeConfig): Layer.Layer<AppConfig> {
    return Layer.succeed(AppConfig, config)
  }
}

export const extractConfigPath = (args: ReadonlyArray<string>): string => {
  for (let i = 0; i < args.length; i++) {
    const arg = args[i]
    if (arg === undefined) continue
    if (arg === "--config" || arg === "-c") {
      const next = args[i + 1]
      if (next !== undefined) return next
    } else if (arg.startsWith("--config=")) {
      return arg.slice("--config=".length)
    }
  }
  return DEFAULT_CONFIG_FILE
}

/** Options that consume the following argument */
const VALUE_OPTIONS = new Set(["--timeout", "-t", "--memory", "-m", "--lang", "--config", "-c"])

/**
 * Whether --verbose/-v appears among the leading options. Scanning stops at
 * `--` and at the first positional, which belongs to the program.
 */
export const extractVerbose = (args: ReadonlyArray<string>): boolean => {
  for (let i = 0; i < args.length; i++) {
    const arg = args[i]
    if (arg === undefined || arg === "--" || !arg.startsWith("-")) return false
    if (arg === "--verbose" || arg === "-v") return true
    if (VALUE_OPTIONS.has(arg)) i++
  }
  return false
}

/** $XDG_CACHE_HOME/ucode, falling back to ~/.cache/ucode */
export const resolveCacheDir = (
  config: Pick<UcodeConfig, "cacheDir">,
  env: Readonly<Record<string, string | undefined>> = process.env
): string =>
  Option.getOrElse(config.cacheDir, () => {
    const cacheHome = env.XDG_CACHE_HOME
    const base = cacheHome !== undefined && cacheHome !== "" ? cacheHome : Path.join(os.homedir(), ".cache")
    return Path.join(base, "ucode")
  })

/** Pick the message catalog: explicit setting, else the LANG/LC_ALL locale */
export const resolveMessageLanguage = (
  setting: UcodeConfig["language"],
  env: Readonly<Record<string, string | undefined>> = process.env
): "en" | "zh" => {
  if (setting !== "auto") return setting
  const locale = env.LC_ALL ?? env.LC_MESSAGES ?? env.LANG ?? ""
  return locale.toLowerCase().startsWith("zh") ? "zh" : "en"
}
