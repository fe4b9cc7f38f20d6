/**
 * Sandbox Types
 *
 * A sandbox here is an external isolation tool the runner wraps the program's
 * argv with. Nothing is isolated in-process.
 */
import { Schema } from "effect"

/** Supported tools, in detection preference order */
export const SandboxTool = Schema.Literal("firejail", "nsjail", "bubblewrap", "systemd-run")
export type SandboxTool = typeof SandboxTool.Type

export const SANDBOX_PREFERENCE: ReadonlyArray<SandboxTool> = SandboxTool.literals

export interface WrapOptions {
  /** 0 = no limit */
  readonly memoryLimitBytes: number
  readonly workingDirectory: string
  /** Give the program an empty private /tmp */
  readonly privateTmp: boolean
}

export interface WrappedCommand {
  readonly command: string
  readonly args: ReadonlyArray<string>
}

export interface SandboxAdapter {
  readonly tool: SandboxTool
  /** Name looked up on PATH */
  readonly executable: string
  readonly enforcesMemory: boolean
  /** Arguments placed between the sandbox executable and the wrapped command */
  readonly wrapArgs: (options: WrapOptions, command: string, args: ReadonlyArray<string>) => ReadonlyArray<string>
}

/** A tool found on PATH */
export interface DetectedSandbox {
  readonly tool: SandboxTool
  readonly path: string
}
