import consola from "consola"

import { delay } from "./cancellation"
import type { TaskFn } from "./tasks"
import type { Phase, TaskContext } from "./types"

export const PROGRESS_INTERVAL_MS = 1000

const PHASE_CHARS: Record<Phase, string> = {
  off: "o",
  booting: "b",
  running: "r",
  shutting_down: "s",
}

export function phaseChar(phase: Phase): string {
  return PHASE_CHARS[phase]
}

// Heartbeat of one character per tick. Only reads shared state, and a broken
// output stream is not worth aborting a VM over.
export function reportProgress(
  { session, shutdown, log }: TaskContext,
  out: NodeJS.WritableStream | null,
  intervalMs: number = PROGRESS_INTERVAL_MS,
): TaskFn {
  let broken = false
  const emit = (text: string) => {
    if (!out || broken) return
    try {
      out.write(text)
    } catch (err) {
      broken = true
      consola.debug("Progress output failed:", err)
    }
  }

  return async (signal) => {
    // Write failures (EPIPE, a closed terminal) arrive as "error" events
    out?.on("error", (err) => {
      broken = true
      consola.debug("Progress output failed:", err)
    })

    let noticed = false
    while (session.phase !== "off") {
      emit(phaseChar(session.phase))
      if (!noticed && shutdown.isRaised) {
        noticed = true
        emit("\n")
        consola.info("Shutdown requested")
        log.write("Shutdown requested")
      }
      await delay(intervalMs, signal)
    }
    emit("\n")
  }
}
