import { QmpClient } from "./qmp-client"
import type { TaskFn } from "./tasks"
import type { TaskContext } from "./types"

// Negotiate QMP once the guest is up, then turn the shutdown request into an
// ACPI power-down and wait for the guest to report it has gone down. Phase
// only returns to off when the supervisor sees the process exit.
export function negotiateShutdown({
  session,
  tasks,
  shutdown,
  log,
}: TaskContext): TaskFn {
  return async (signal) => {
    // The boot watchdog bounds this wait
    await tasks.completion("bootProbe", signal)

    // Any failure from here is fatal to this task only; the shutdown
    // watchdog then decides how long to keep waiting.
    const client = await QmpClient.connect(session.qmpSocket, signal)
    try {
      log.write(`Opened socket ${session.qmpSocket}`)

      await client.negotiate(signal)
      session.qmpEstablished = true
      log.write("Established QMP connection")

      await shutdown.wait(signal)

      await client.send("system_powerdown")
      session.transition("shutting_down")
      log.write("Sent system_powerdown command")

      await client.waitForEvent("SHUTDOWN", signal)
      log.write("Guest reported SHUTDOWN")
    } finally {
      client.close()
    }
  }
}
