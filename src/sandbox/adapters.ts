/**
 * Sandbox Adapters
 *
 * One argv builder per tool. Each takes the program's command and arguments as
 * discrete entries and returns the full wrapped argv; nothing is joined into a
 * shell string.
 */
import * as os from "node:os"
import * as Path from "node:path"
import type { DetectedSandbox, SandboxAdapter, SandboxTool, WrapOptions, WrappedCommand } from "./types.ts"

const MIB = 1024 * 1024

export const firejail: SandboxAdapter = {
  tool: "firejail",
  executable: "firejail",
  enforcesMemory: true,
  wrapArgs: (options, command, args) => [
    "--quiet",
    "--net=none",
    "--caps.drop=all",
    "--seccomp",
    "--noroot",
    ...(options.privateTmp ? ["--private-tmp"] : []),
    "--rlimit-fsize=10000000",
    "--rlimit-nproc=50",
    "--rlimit-nofile=100",
    ...(options.memoryLimitBytes > 0 ? [`--rlimit-as=${options.memoryLimitBytes}`] : []),
    command,
    ...args
  ]
}

export const nsjail: SandboxAdapter = {
  tool: "nsjail",
  executable: "nsjail",
  enforcesMemory: true,
  wrapArgs: (options, command, args) => [
    "-Mo",
    "--quiet",
    "--chroot",
    "/",
    "--bindmount",
    options.workingDirectory,
    "--cwd",
    options.workingDirectory,
    "--keep_env",
    // nsjail's own default wall clock is 600s; the executor owns the deadline
    "--time_limit",
    "0",
    "--rlimit_as",
    options.memoryLimitBytes > 0 ? String(Math.ceil(options.memoryLimitBytes / MIB)) : "max",
    "--",
    command,
    ...args
  ]
}

export const bubblewrap: SandboxAdapter = {
  tool: "bubblewrap",
  executable: "bwrap",
  enforcesMemory: false,
  wrapArgs: (options, command, args) => [
    "--ro-bind",
    "/",
    "/",
    "--dev",
    "/dev",
    "--proc",
    "/proc",
    ...(options.privateTmp ? ["--tmpfs", "/tmp"] : []),
    "--bind",
    options.workingDirectory,
    options.workingDirectory,
    "--chdir",
    options.workingDirectory,
    "--unshare-all",
    "--die-with-parent",
    "--new-session",
    command,
    ...args
  ]
}

export const systemdRun: SandboxAdapter = {
  tool: "systemd-run",
  executable: "systemd-run",
  enforcesMemory: true,
  wrapArgs: (options, command, args) => [
    "--pipe",
    "--collect",
    "--quiet",
    "--wait",
    "--property=NoNewPrivileges=yes",
    "--property=PrivateDevices=yes",
    "--property=PrivateNetwork=yes",
    ...(options.privateTmp ? ["--property=PrivateTmp=yes"] : []),
    "--property=ProtectHome=read-only",
    "--property=ProtectSystem=strict",
    `--working-directory=${options.workingDirectory}`,
    `--property=ReadWritePaths=${options.workingDirectory}`,
    ...(options.memoryLimitBytes > 0 ? [`--property=MemoryMax=${options.memoryLimitBytes}`] : []),
    "--",
    command,
    ...args
  ]
}

export const ADAPTERS: Readonly<Record<SandboxTool, SandboxAdapter>> = {
  firejail,
  nsjail,
  bubblewrap,
  "systemd-run": systemdRun
}

const isWithin = (root: string, path: string): boolean => {
  const relative = Path.relative(root, path)
  return relative === "" || (!relative.startsWith("..") && !Path.isAbsolute(relative))
}

/**
 * Whether the program can get an empty private /tmp. Artifacts are
 * materialized in the system temp directory, so hiding it would hide them.
 */
export const canUsePrivateTmp = (
  command: string,
  workingDirectory: string,
  tempRoot: string = os.tmpdir()
): boolean => !isWithin(tempRoot, command) && !isWithin(tempRoot, workingDirectory)

export const wrapCommand = (
  sandbox: DetectedSandbox,
  options: WrapOptions,
  command: string,
  args: ReadonlyArray<string>
): WrappedCommand => ({
  command: sandbox.path,
  args: ADAPTERS[sandbox.tool].wrapArgs(options, command, args)
})
