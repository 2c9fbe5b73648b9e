import consola from "consola"

// Signal 0 checks for existence without touching the process. A zombie still
// counts as alive until its parent reaps it.
export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0)
    return true
  } catch {
    return false
  }
}

// The hypervisor runs as the leader of its own process group (it is spawned
// detached), so signal the group and take any helpers down with it.
export function signalProcessGroup(pid: number, signal: NodeJS.Signals): boolean {
  try {
    process.kill(-pid, signal)
    return true
  } catch (groupError) {
    consola.debug(`Failed to signal process group ${pid}:`, groupError)
  }
  try {
    process.kill(pid, signal)
    return true
  } catch (err) {
    consola.warn(`Failed to send ${signal} to ${pid}:`, err)
    return false
  }
}
