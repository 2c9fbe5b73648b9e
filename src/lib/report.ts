import type { RunResult } from "../lifecycle/types"

export interface RunReport {
  success: boolean
  exitCode: number
  // Printed and appended to the session log, in order
  messages: Array<string>
}

export interface ReportContext {
  mem: number
  isAlive: (pid: number) => boolean
}

function describeExit(result: RunResult, isAlive: (pid: number) => boolean): string {
  const end = `see ${result.logFile}`
  const status = result.exitStatus

  if (status === undefined) {
    if (result.pid === undefined) return `Failed to start VM process: ${end}`
    if (!isAlive(result.pid)) return `VM process died uncleanly: ${end}`
    return [
      `Apparently failed to shut down VM process: ${end}`,
      "",
      `Try logging in with ssh and issuing "sudo shutdown now" manually; otherwise`,
      `kill process ${result.pid} if it's unresponsive.`,
    ].join("\n")
  }
  if (status < 0) return `VM process killed with signal ${-status}: ${end}`
  return `VM process completed with error status ${status}: ${end}`
}

export function memoryAdvice(mem: number): string {
  return [
    `It looks like QEMU failed to allocate ${mem}GB of contiguous memory to run the VM.`,
    "",
    "Try restarting large programs such as your Web browser, to reduce memory",
    "fragmentation (or closing them entirely if that doesn't solve it). If the",
    `problem persists, try reducing "mem" in the configuration (without going`,
    "below 0.25 to 0.5GB, for acceptable performance with a minimal installation).",
  ].join("\n")
}

// Shell convention for "killed by signal n"
export function exitCodeFor(result: Pick<RunResult, "exitStatus">): number {
  const status = result.exitStatus
  if (status === undefined) return 1
  return status < 0 ? 128 - status : status
}

export function buildReport(result: RunResult, ctx: ReportContext): RunReport {
  const exitCode = exitCodeFor(result)

  if (result.exitStatus === 0 && result.timeout === undefined) {
    return { success: true, exitCode, messages: ["VM process completed successfully"] }
  }

  const messages: Array<string> = []
  if (result.timeout === "boot") {
    messages.push("Boot timed out; the guest never answered on its ssh port.")
  } else if (result.timeout === "shutdown") {
    messages.push("Shut down timed out; the guest did not power off in time.")
  }

  if (result.exitStatus === 0) {
    messages.push("VM process completed successfully")
  } else {
    messages.push(describeExit(result, ctx.isAlive))
  }

  if (result.memoryError) messages.push(memoryAdvice(ctx.mem))

  return { success: false, exitCode, messages }
}
