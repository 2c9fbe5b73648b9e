import fs from "node:fs"
import fsp, { type FileHandle } from "node:fs/promises"

export interface LogWriteOptions {
  timestamp?: boolean
}

// Local wall-clock time as HH:MM:SS
export function timestamp(date: Date = new Date()): string {
  return date.toTimeString().slice(0, 8)
}

/**
 * The per-session log file. The hypervisor holds its own append-mode
 * descriptor on the same file, so every write here also appends; the kernel
 * keeps the two writers from clobbering each other.
 */
export class SessionLog {
  constructor(readonly path: string) {}

  // Synchronous so that lines keep their order across tasks and still land
  // when written from a cleanup path.
  write(message: string, options: LogWriteOptions = {}): void {
    const line =
      options.timestamp === false ? message : `${timestamp()}  ${message}`
    fs.appendFileSync(this.path, `${line}\n`, "utf8")
  }

  // Delete and let the next write recreate it, rather than truncating a file
  // something else may still have open.
  async reset(): Promise<void> {
    await fsp.rm(this.path, { force: true })
  }

  // Descriptor for the child's stdout/stderr
  async openForChild(): Promise<FileHandle> {
    return fsp.open(this.path, "a")
  }

  async contains(needle: string): Promise<boolean> {
    try {
      const content = await fsp.readFile(this.path)
      return content.includes(needle)
    } catch {
      return false
    }
  }
}
