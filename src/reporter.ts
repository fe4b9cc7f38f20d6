/**
 * RunReporter - presentation of a run.
 *
 * Consumes status events and the final RunReport; never influences control
 * flow. Rendering helpers are pure so they can be checked without a terminal.
 */
import chalk from "chalk"
import { Console, Context, Effect, Layer, Option } from "effect"
import type { RunReport, RunStatus } from "./domain.ts"
import { Highlighter } from "./highlighter.ts"
import { formatDuration, Messages } from "./messages.ts"
import type { MessageKey } from "./messages.ts"

// =============================================================================
// Rendering
// =============================================================================

interface BoxCharacters {
  readonly topLeft: string
  readonly bottomLeft: string
  readonly horizontal: string
  readonly vertical: string
}

const UNICODE_BOX: BoxCharacters = { topLeft: "┌", bottomLeft: "└", horizontal: "─", vertical: "│" }
const ASCII_BOX: BoxCharacters = { topLeft: "+", bottomLeft: "+", horizontal: "-", vertical: "|" }

const ICONS = {
  unicode: { ok: "✓", fail: "✗", timeout: "⏱", info: "▸" },
  ascii: { ok: "[OK]", fail: "[FAIL]", timeout: "[TIMEOUT]", info: ">" }
} as const

/** Open-sided box; the right edge is left out so wide characters cannot misalign it */
export const renderBox = (title: string, body: string, ascii: boolean, width = 50): ReadonlyArray<string> => {
  const c = ascii ? ASCII_BOX : UNICODE_BOX
  const lines = body === "" ? [] : body.replace(/\n$/, "").split("\n")
  const top = `${c.topLeft}${c.horizontal} ${title} ${c.horizontal.repeat(Math.max(3, width - title.length - 4))}`
  const bottom = `${c.bottomLeft}${c.horizontal.repeat(width - 1)}`
  return [top, ...lines.map((line) => `${c.vertical} ${line}`), bottom]
}

type Translate = (key: MessageKey, values?: Readonly<Record<string, string | number>>) => string

export type SummaryTone = "ok" | "fail" | "timeout"

/** The closing line of a run and how it should be colored */
export const summaryOf = (report: RunReport, t: Translate, ascii: boolean): { tone: SummaryTone; text: string } => {
  const icons = ascii ? ICONS.ascii : ICONS.unicode
  if (Option.isNone(report.execution)) {
    return { tone: "fail", text: `${icons.fail} ${t("compileFailed")}` }
  }
  const { outcome, durationMs } = report.execution.value
  const duration = formatDuration(durationMs)
  switch (outcome._tag) {
    case "Success":
      return { tone: "ok", text: `${icons.ok} ${t("success", { duration })}` }
    case "NonZeroExit":
      return { tone: "fail", text: `${icons.fail} ${t("failed", { code: outcome.code, duration })}` }
    case "Signaled":
      return { tone: "fail", text: `${icons.fail} ${t("signaled", { signal: outcome.signal, duration })}` }
    case "TimedOut":
      return {
        tone: "timeout",
        text: `${icons.timeout} ${t("timedOut", { seconds: Math.round(outcome.timeoutMs / 1000) })}`
      }
  }
}

const paint = (tone: SummaryTone, text: string): string =>
  tone === "ok" ? chalk.green(text) : tone === "timeout" ? chalk.yellow(text) : chalk.red(text)

// =============================================================================
// Service
// =============================================================================

interface RunReporterInterface {
  readonly started: (language: string, file: string) => Effect.Effect<void>
  readonly status: (status: RunStatus) => Effect.Effect<void>
  readonly report: (report: RunReport) => Effect.Effect<void>
  readonly cacheCleared: (count: number, directory: string) => Effect.Effect<void>
  readonly extensions: (extensions: ReadonlyArray<string>) => Effect.Effect<void>
}

export class RunReporter extends Context.Tag("@ucode/RunReporter")<
  RunReporter,
  RunReporterInterface
>() {
  /** Colored status lines and boxed output on the terminal */
  static console(options: { readonly ascii: boolean }): Layer.Layer<RunReporter, never, Messages | Highlighter> {
    return Layer.effect(
      RunReporter,
      Effect.gen(function*() {
        const { t } = yield* Messages
        const highlighter = yield* Highlighter
        const { ascii } = options
        const icons = ascii ? ICONS.ascii : ICONS.unicode

        const box = (title: string, body: string, color: (s: string) => string) =>
          Console.log(renderBox(title, body, ascii).map(color).join("\n"))

        const status = (value: RunStatus) => {
          switch (value) {
            case "Compiling":
              return Console.log(chalk.cyan(`${icons.info} ${t("compiling")}`))
            case "UsingCache":
              return Console.log(chalk.cyan(`${icons.info} ${t("usingCache")}`))
            case "Executing":
              return Console.log(chalk.cyan(`${icons.info} ${t("executing")}`))
            // Terminal states are rendered with the report
            case "Success":
            case "Failed":
            case "TimedOut":
              return Effect.void
          }
        }

        const report = (value: RunReport) =>
          Effect.gen(function*() {
            if (Option.isSome(value.compilerOutput)) {
              yield* box(t("compilerOutput"), value.compilerOutput.value, chalk.red)
            }
            if (Option.isSome(value.execution)) {
              const execution = value.execution.value
              if (Option.isSome(execution.sandboxTool)) {
                yield* Console.log(chalk.dim(t("sandbox", { tool: execution.sandboxTool.value })))
              }
              const body = execution.output === ""
                ? t("noOutput")
                : yield* highlighter.highlight(execution.output, value.extension)
              yield* box(t("programOutput"), body, (line) => line)
            }
            const summary = summaryOf(value, t, ascii)
            yield* Console.log(paint(summary.tone, summary.text))
          })

        return RunReporter.of({
          started: (language, file) => Console.log(chalk.bold(`${icons.info} ${t("detected", { language, file })}`)),
          status,
          report,
          cacheCleared: (count, directory) => Console.log(t("cacheCleared", { count, directory })),
          extensions: (extensions) =>
            Console.log(`${t("supported")} ${extensions.map((extension) => `.${extension}`).join(" ")}`)
        })
      })
    )
  }

  /** Records statuses and reports; prints nothing */
  static collecting(sink: {
    readonly statuses: Array<RunStatus>
    readonly reports: Array<RunReport>
  }): Layer.Layer<RunReporter> {
    return Layer.succeed(
      RunReporter,
      RunReporter.of({
        started: () => Effect.void,
        status: (value) => Effect.sync(() => sink.statuses.push(value)),
        report: (value) => Effect.sync(() => sink.reports.push(value)),
        cacheCleared: () => Effect.void,
        extensions: () => Effect.void
      })
    )
  }
}
