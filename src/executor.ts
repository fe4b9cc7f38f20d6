/**
 * Executor - runs the program under a deadline and an optional sandbox.
 *
 * The child is the leader of its own process group, so the deadline can take
 * down everything it spawned: SIGTERM to the group, then SIGKILL once the
 * grace period passes. Output captured before the deadline is kept.
 *
 * The group is followed past the leader: when the leader exits on SIGTERM but
 * other members are still running, the result waits for the SIGKILL.
 */
import { Context, Duration, Effect, Layer, Option, Schedule } from "effect"
import { spawn } from "node:child_process"
import type { ChildProcess } from "node:child_process"
import { StringDecoder } from "node:string_decoder"
import { ExecutionOutcome } from "./domain.ts"
import type { ExecutionRequest, ExecutionResult, StdinMode } from "./domain.ts"
import { SpawnError } from "./errors.ts"
import { ADAPTERS, canUsePrivateTmp, SandboxDetector, wrapCommand } from "./sandbox/index.ts"
import { formatCommandLine, isUnsafeArgument, shellQuote } from "./toolchain.ts"

// =============================================================================
// Process Spawning
// =============================================================================

export interface SpawnPlan {
  readonly command: string
  readonly args: ReadonlyArray<string>
  readonly cwd: string
  /** 0 = no deadline */
  readonly timeoutMs: number
  readonly killGraceMs: number
  readonly stdin: StdinMode
}

export interface Collected {
  readonly stdout: string
  readonly stderr: string
  readonly output: string
  readonly outcome: ExecutionOutcome
  readonly durationMs: number
  /** Signal deliveries that failed for a reason other than the group being gone */
  readonly signalFailures: ReadonlyArray<unknown>
}

const isErrnoException = (u: unknown): u is NodeJS.ErrnoException => u instanceof Error && "code" in u

/**
 * Spawn the command in a new process group and collect its output until every
 * stream is closed. Interrupting the effect terminates the group.
 */
export const spawnAndCollect = (plan: SpawnPlan): Effect.Effect<Collected, SpawnError> =>
  Effect.async<Collected, SpawnError>((resume) => {
    const start = performance.now()
    let completed = false
    let timedOut = false
    let killSent = false
    let pending: Effect.Effect<Collected, SpawnError> | undefined
    let termTimer: ReturnType<typeof setTimeout> | undefined
    let killTimer: ReturnType<typeof setTimeout> | undefined
    const signalFailures: Array<unknown> = []

    let child: ChildProcess
    try {
      child = spawn(plan.command, [...plan.args], {
        cwd: plan.cwd,
        detached: true,
        stdio: [plan.stdin === "inherit" ? "pipe" : "ignore", "pipe", "pipe"]
      })
    } catch (cause) {
      resume(Effect.fail(new SpawnError({ command: plan.command, cause })))
      return
    }

    const killGroup = (signal: NodeJS.Signals) => {
      const pid = child.pid
      if (pid === undefined) return
      try {
        process.kill(-pid, signal)
      } catch (error) {
        // ESRCH: the whole group already exited
        if (!(isErrnoException(error) && error.code === "ESRCH")) signalFailures.push(error)
      }
    }

    const groupAlive = () => {
      const pid = child.pid
      if (pid === undefined) return false
      try {
        process.kill(-pid, 0)
        return true
      } catch {
        return false
      }
    }

    const childStdin = child.stdin
    if (childStdin !== null) {
      childStdin.on("error", (error) => {
        // EPIPE: the program exited without reading all of its input
        if (!(isErrnoException(error) && error.code === "EPIPE")) signalFailures.push(error)
      })
      process.stdin.pipe(childStdin)
    }
    // Nothing reads stdin after the program; a paused handle would keep the process alive
    const detachStdin = () => {
      if (childStdin === null) return
      process.stdin.unpipe(childStdin)
      process.stdin.destroy()
    }

    const safeResume = (effect: Effect.Effect<Collected, SpawnError>) => {
      if (completed) return
      completed = true
      if (termTimer) clearTimeout(termTimer)
      if (killTimer) clearTimeout(killTimer)
      detachStdin()
      resume(effect)
    }

    let stdout = ""
    let stderr = ""
    let output = ""
    const stdoutDecoder = new StringDecoder("utf8")
    const stderrDecoder = new StringDecoder("utf8")
    const appendStdout = (text: string) => {
      stdout += text
      output += text
    }
    const appendStderr = (text: string) => {
      stderr += text
      output += text
    }

    child.stdout?.on("data", (chunk: Buffer) => appendStdout(stdoutDecoder.write(chunk)))
    child.stderr?.on("data", (chunk: Buffer) => appendStderr(stderrDecoder.write(chunk)))

    if (plan.timeoutMs > 0) {
      termTimer = setTimeout(() => {
        timedOut = true
        killGroup("SIGTERM")
        killTimer = setTimeout(() => {
          killSent = true
          killGroup("SIGKILL")
          if (pending !== undefined) safeResume(pending)
        }, plan.killGraceMs)
      }, plan.timeoutMs)
    }

    child.on("error", (cause) => safeResume(Effect.fail(new SpawnError({ command: plan.command, cause }))))

    child.on("close", (code, signal) => {
      appendStdout(stdoutDecoder.end())
      appendStderr(stderrDecoder.end())

      const outcome: ExecutionOutcome = timedOut
        ? ExecutionOutcome.TimedOut({ timeoutMs: plan.timeoutMs })
        : signal !== null
        ? ExecutionOutcome.Signaled({ signal })
        : code === 0
        ? ExecutionOutcome.Success()
        : ExecutionOutcome.NonZeroExit({ code: code ?? 1 })

      const result = Effect.succeed({
        stdout,
        stderr,
        output,
        outcome,
        durationMs: performance.now() - start,
        signalFailures
      })
      // Members that outlived the leader get the SIGKILL when the grace period ends
      if (timedOut && !killSent && groupAlive()) {
        pending = result
        return
      }
      safeResume(result)
    })

    // Interrupted (Ctrl-C, scope closed): the group is in its own session and
    // never saw the terminal's SIGINT. Interruption completes only once the
    // group is gone.
    return Effect.suspend(() => {
      if (completed) return Effect.void
      completed = true
      if (termTimer) clearTimeout(termTimer)
      if (killTimer) clearTimeout(killTimer)
      detachStdin()
      killGroup("SIGTERM")
      return Effect.sync(groupAlive).pipe(
        Effect.repeat({ schedule: Schedule.spaced(Duration.millis(25)), while: (alive) => alive }),
        Effect.timeoutOption(Duration.millis(plan.killGraceMs)),
        Effect.zipRight(Effect.sync(() => killGroup("SIGKILL")))
      )
    })
  })

// =============================================================================
// Service
// =============================================================================

interface ExecutorInterface {
  readonly run: (request: ExecutionRequest) => Effect.Effect<ExecutionResult, SpawnError>
}

export class Executor extends Context.Tag("@ucode/Executor")<
  Executor,
  ExecutorInterface
>() {
  static readonly layer: Layer.Layer<Executor, never, SandboxDetector> = Layer.effect(
    Executor,
    Effect.gen(function*() {
      const detector = yield* SandboxDetector

      /** Wrap the argv when a sandbox was requested and one is installed */
      const applySandbox = (request: ExecutionRequest) =>
        Effect.gen(function*() {
          const { limits } = request
          const unwrapped = { command: request.command, args: request.args, sandboxTool: Option.none<string>() }
          if (!limits.sandbox) return unwrapped

          const detected = yield* detector.detect
          if (Option.isNone(detected)) {
            yield* Effect.logWarning(
              "No sandbox tool found (firejail, nsjail, bubblewrap, systemd-run); running without isolation"
            )
            return unwrapped
          }

          const { tool } = detected.value
          if (limits.memoryLimitBytes > 0 && !ADAPTERS[tool].enforcesMemory) {
            yield* Effect.logWarning(`${tool} cannot enforce the memory limit; it is ignored`)
          }
          const wrapped = wrapCommand(detected.value, {
            memoryLimitBytes: limits.memoryLimitBytes,
            workingDirectory: request.workingDirectory,
            privateTmp: canUsePrivateTmp(request.command, request.workingDirectory)
          }, request.command, request.args)
          return { ...wrapped, sandboxTool: Option.some<string>(tool) }
        })

      const run = (request: ExecutionRequest) =>
        Effect.gen(function*() {
          for (const arg of request.args) {
            if (isUnsafeArgument(arg)) {
              yield* Effect.logWarning(`Argument contains shell metacharacters, passed verbatim: ${shellQuote(arg)}`)
            }
          }

          const { command, args, sandboxTool } = yield* applySandbox(request)
          if (request.limits.memoryLimitBytes > 0 && Option.isNone(sandboxTool)) {
            yield* Effect.logWarning("Memory limit is only enforced inside a sandbox; running without one")
          }

          yield* Effect.logDebug(`Executing: ${formatCommandLine(command, args)}`)
          const collected = yield* spawnAndCollect({
            command,
            args,
            cwd: request.workingDirectory,
            timeoutMs: request.limits.timeoutMs,
            killGraceMs: request.limits.killGraceMs,
            stdin: request.stdin
          })
          for (const failure of collected.signalFailures) {
            yield* Effect.logDebug("Signal delivery failed", String(failure))
          }

          return {
            stdout: collected.stdout,
            stderr: collected.stderr,
            output: collected.output,
            outcome: collected.outcome,
            durationMs: collected.durationMs,
            sandboxTool
          } satisfies ExecutionResult
        }).pipe(Effect.withLogSpan("execute"))

      return Executor.of({ run })
    })
  )
}
