import consola from "consola"

import { delay } from "./cancellation"
import { isCancellation } from "./errors"
import type { TaskFn } from "./tasks"
import type { TaskContext } from "./types"

export const BOOT_TIMEOUT_MS = 300_000
export const SHUTDOWN_TIMEOUT_MS = 60_000

// Long enough for a routine fsck before handing control back to the user.
// Cancellation is how this normally ends: the boot probe cancels it.
export function bootWatchdog(
  { session, tasks, log }: TaskContext,
  timeoutMs: number = BOOT_TIMEOUT_MS,
): TaskFn {
  return async (signal) => {
    try {
      await delay(timeoutMs, signal)
    } catch (error) {
      if (isCancellation(error)) return
      throw error
    }

    if (session.phase === "booting") {
      session.timeout = "boot"
      consola.error("Timed out waiting for the VM to boot.")
      log.write(`Boot timed out after ${timeoutMs / 1000}s`)
      // May leave QEMU running; see the supervisor's timeout policy
      tasks.cancel()
    }
  }
}

// Shutting down normally takes a couple of seconds. The supervisor cancels
// this as soon as the process exits.
export function shutdownWatchdog(
  { session, tasks, shutdown, log }: TaskContext,
  timeoutMs: number = SHUTDOWN_TIMEOUT_MS,
): TaskFn {
  return async (signal) => {
    await tasks.completion("bootProbe", signal)
    await shutdown.wait(signal)
    await delay(timeoutMs, signal)

    session.timeout = "shutdown"
    consola.error("Shut down timed out.")
    log.write(`Shut down timed out after ${timeoutMs / 1000}s`)
    tasks.cancel()
  }
}
