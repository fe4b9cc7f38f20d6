/**
 * Sandbox
 *
 * Best-effort isolation by wrapping the program's argv with an external tool
 * (firejail, nsjail, bubblewrap or systemd-run).
 *
 * @example
 * ```ts
 * const detector = yield* SandboxDetector
 * const sandbox = yield* detector.detect
 * if (Option.isSome(sandbox)) {
 *   const wrapped = wrapCommand(sandbox.value, {
 *     memoryLimitBytes: 256 * 1024 * 1024,
 *     workingDirectory: "/home/user/project",
 *     privateTmp: false
 *   }, "/tmp/build/main", [])
 * }
 * ```
 */

// Types
export type { DetectedSandbox, SandboxAdapter, WrapOptions, WrappedCommand } from "./types.ts"
export { SANDBOX_PREFERENCE, SandboxTool } from "./types.ts"

// Adapters
export { ADAPTERS, bubblewrap, canUsePrivateTmp, firejail, nsjail, systemdRun, wrapCommand } from "./adapters.ts"

// Services
export { detectAvailableSandbox, SandboxDetector } from "./services.ts"
