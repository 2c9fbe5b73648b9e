import consola from "consola"
import { spawn } from "node:child_process"
import os from "node:os"
import type { FileHandle } from "node:fs/promises"

import { buildQemuArgs } from "../lib/qemu-args"

import { abortable } from "./cancellation"
import { signalProcessGroup } from "./pid"
import type {
  TaskContext,
  TimeoutPolicy,
  VmLauncher,
  VmProcessHandle,
} from "./types"
import type { TaskFn } from "./tasks"

// QEMU exits with status 1 for nearly everything; this line (which doesn't
// change with the locale) is how we tell a failed guest RAM allocation apart.
export const MEMORY_ERROR_MARKER = "cannot set up guest memory"

// Tasks that must never outlive the hypervisor process
const DEPENDENT_TASKS = [
  "shutdown",
  "bootProbe",
  "shutdownWatchdog",
  "bootWatchdog",
] as const

export const spawnHypervisor: VmLauncher = (command, args, logFd) => {
  // Detached puts QEMU in its own session, so a Ctrl-C on our terminal
  // reaches us (and becomes a graceful shutdown) but not the VM.
  const child = spawn(command, args, {
    detached: true,
    stdio: ["pipe", logFd, logFd],
  })

  const exited = new Promise<number>((resolve, reject) => {
    child.on("error", reject)
    child.once("exit", (code, signal) => {
      if (code !== null) {
        resolve(code)
      } else {
        resolve(signal ? -os.constants.signals[signal] : -1)
      }
    })
  })

  return {
    pid: child.pid,
    wait: () => exited,
    kill: (signal) => {
      if (child.pid !== undefined) signalProcessGroup(child.pid, signal)
    },
    release: () => {
      child.stdin?.destroy()
      child.unref()
    },
  }
}

export interface SupervisorOptions {
  launcher: VmLauncher
  onTimeout: TimeoutPolicy
}

export function superviseProcess(
  { session, tasks, log }: TaskContext,
  options: SupervisorOptions,
): TaskFn {
  return async (signal) => {
    let logHandle: FileHandle | undefined
    let child: VmProcessHandle | undefined

    try {
      logHandle = await log.openForChild()
      child = options.launcher(session.cmd, buildQemuArgs(session), logHandle.fd)
      session.pid = child.pid
      if (child.pid !== undefined) log.write(`Subprocess Id ${child.pid}`)

      session.exitStatus = await abortable(child.wait(), signal)

      if (
        session.exitStatus === 1
        && (await log.contains(MEMORY_ERROR_MARKER))
      ) {
        session.memoryError = true
      }
    } finally {
      tasks.cancel(...DEPENDENT_TASKS)
      session.transition("off")

      // Only reached when a watchdog gave up and cancelled us mid-wait
      if (child && session.exitStatus === undefined && signal.aborted) {
        if (options.onTimeout === "terminate") {
          consola.warn(`Terminating VM process ${child.pid ?? "(no pid)"}`)
          log.write(`Sending SIGTERM to process group ${child.pid ?? "(no pid)"}`)
          child.kill("SIGTERM")
        } else {
          log.write(`Leaving VM process ${child.pid ?? "(no pid)"} running`)
        }
        child.release()
      }

      await logHandle?.close()
    }
  }
}
