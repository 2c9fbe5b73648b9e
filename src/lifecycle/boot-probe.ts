import consola from "consola"

import { LineReader, openConnection } from "../lib/socket"
import type { SessionLog } from "../lib/session-log"

import { delay } from "./cancellation"
import { BootProbeError, isCancellation } from "./errors"
import type { TaskFn } from "./tasks"
import type { TaskContext } from "./types"

export const SSH_BANNER_PREFIX = "SSH-2.0-"

/**
 * One probe: connect to the forwarded ssh port and check the first line the
 * guest sends. The socket is closed before the reply is judged. Early in boot
 * QEMU's user-mode network accepts the connection and then drops it, which
 * shows up here as an empty reply.
 */
export async function checkSsh(
  port: number,
  signal: AbortSignal,
  log?: SessionLog,
): Promise<string> {
  const socket = await openConnection({ host: "127.0.0.1", port }, signal)
  const reader = new LineReader(socket)

  let reply: string | null
  try {
    reply = await reader.readLine(signal)
  } finally {
    reader.close()
  }

  log?.write(`Reply ${JSON.stringify(reply ?? "")} from guest ssh service`)

  if (!reply || !reply.startsWith(SSH_BANNER_PREFIX)) {
    throw new BootProbeError(
      `Bad reply ${JSON.stringify(reply ?? "")} from guest ssh service`,
    )
  }
  return reply
}

export function probeBoot(
  { session, tasks, log }: TaskContext,
  intervalMs: number,
): TaskFn {
  return async (signal) => {
    while (session.phase === "booting") {
      log.write("Attempt ssh connection")
      try {
        await checkSsh(session.port, signal, log)
      } catch (error) {
        if (isCancellation(error)) throw error
        // Refused, reset or wrong banner: the guest isn't up yet
        consola.debug("Boot probe failed:", error)
        await delay(intervalMs, signal)
        continue
      }

      session.transition("running")
      log.write("Guest ssh service is up")
      tasks.cancel("bootWatchdog")
      break
    }

    // Normally we're cancelled before this can happen. Returning quietly
    // keeps the tasks waiting on boot from seeing a spurious error.
    if (session.phase !== "running") {
      consola.warn(
        `State changed before successful connection to localhost:${session.port}`,
      )
    }
  }
}
