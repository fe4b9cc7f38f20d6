/**
 * CLI Error Handling
 *
 * Centralized error rendering for the command. Tagged errors carry their own
 * message; anything else is shown as-is.
 */
import { Runtime } from "@effect/platform"
import chalk from "chalk"
import { Cause, Console, Effect, Exit, Predicate } from "effect"
import type { MessageKey } from "../messages.ts"

type Translate = (key: MessageKey, values?: Readonly<Record<string, string | number>>) => string

export const describeError = (error: unknown): string => {
  if (Predicate.hasProperty(error, "_tag") && Predicate.hasProperty(error, "message")) {
    return typeof error.message === "string" && error.message !== "" ? error.message : String(error)
  }
  if (error instanceof Error) return error.message
  return String(error)
}

/** Render an error to stderr and mark the process as failed */
export const renderError = (error: unknown, t: Translate): Effect.Effect<void> =>
  Console.error(chalk.red(t("error", { message: describeError(error) }))).pipe(
    Effect.zipRight(Effect.sync(() => {
      process.exitCode = 1
    }))
  )

/** Shell convention for a run ended by SIGINT */
export const INTERRUPTED_EXIT_CODE = 130

/** Exit code for the whole invocation; an interrupted run is not a success */
export const teardown: Runtime.Teardown = (exit, onExit) => {
  if (Exit.isFailure(exit) && Cause.isInterruptedOnly(exit.cause)) {
    onExit(INTERRUPTED_EXIT_CODE)
    return
  }
  Runtime.defaultTeardown(exit, onExit)
}
