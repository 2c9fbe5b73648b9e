import type { SessionLog } from "../lib/session-log"

import type { VmSession } from "./session"
import type { ShutdownSignal } from "./shutdown-signal"
import type { TaskSet } from "./tasks"

export type Phase = "off" | "booting" | "running" | "shutting_down"

export const PHASES: ReadonlyArray<Phase> = [
  "off",
  "booting",
  "running",
  "shutting_down",
]

export type TaskName =
  | "supervisor"
  | "bootProbe"
  | "progress"
  | "bootWatchdog"
  | "shutdown"
  | "shutdownWatchdog"

export type TimeoutKind = "boot" | "shutdown"

// What to do with a still-running hypervisor when a watchdog gives up on it
export type TimeoutPolicy = "abandon" | "terminate"

export interface VmSettings {
  diskImage: string
  cmd: string
  // Guest memory in GB; fractions are fine
  mem: number
  // Host port forwarded to the guest's sshd
  port: number
}

// A launched hypervisor process, as far as the supervisor cares
export interface VmProcessHandle {
  readonly pid: number | undefined
  // Resolves with the exit code, or minus the signal number if killed
  wait(): Promise<number>
  kill(signal: NodeJS.Signals): void
  // Stop holding the process and its stdin pipe, so we can exit before it does
  release(): void
}

export type VmLauncher = (
  command: string,
  args: Array<string>,
  logFd: number,
) => VmProcessHandle

export interface ControllerOptions extends VmSettings {
  logFile: string
  qmpSocket: string
  onTimeout?: TimeoutPolicy
  bootTimeoutMs?: number
  shutdownTimeoutMs?: number
  probeIntervalMs?: number
  progressIntervalMs?: number
  // Where phase characters go; null keeps the reporter quiet
  progressStream?: NodeJS.WritableStream | null
  launcher?: VmLauncher
  // Tests drive shutdown through requestShutdown() instead
  installSignalHandlers?: boolean
}

export interface TaskFailure {
  task: TaskName
  error: unknown
}

export interface RunResult {
  phase: Phase
  pid?: number
  exitStatus?: number
  memoryError: boolean
  qmpEstablished: boolean
  timeout?: TimeoutKind
  failures: Array<TaskFailure>
  logFile: string
}

// Everything a supervising task may touch. Only the session is mutable, and
// each of its fields has exactly one writing task.
export interface TaskContext {
  session: VmSession
  tasks: TaskSet<TaskName>
  shutdown: ShutdownSignal
  log: SessionLog
}
