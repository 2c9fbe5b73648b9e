import os from "node:os"
import path from "node:path"

function appDir(): string {
  return (
    process.env.VMWARDEN_HOME
    ?? path.join(os.homedir(), ".local", "share", "vmwarden")
  )
}

export const PATHS = {
  get APP_DIR() {
    return appDir()
  },
  get CONFIG_PATH() {
    return path.join(appDir(), "config.json")
  },
}

// One log per disk image, next to wherever the user ran us
export function logFileFor(title: string, cwd: string = process.cwd()): string {
  return path.join(cwd, `vmwarden_${title}.log`)
}

// Keyed on our own pid so two supervisors never share a QMP socket
export function qmpSocketPath(pid: number = process.pid): string {
  return path.join(os.tmpdir(), `.vmwarden_qmp_${pid}`)
}
