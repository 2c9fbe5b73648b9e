import path from "node:path"

import { InvalidTransitionError } from "./errors"
import type { Phase, TimeoutKind, VmSettings } from "./types"

const NEXT: Record<Phase, ReadonlyArray<Phase>> = {
  off: ["booting"],
  booting: ["running"],
  running: ["shutting_down"],
  shutting_down: [],
}

export interface SessionPaths {
  logFile: string
  qmpSocket: string
}

// State owner for one supervised VM. Each field has a single writer task;
// phase changes only go through transition().
export class VmSession {
  readonly diskImage: string
  readonly cmd: string
  readonly mem: number
  readonly port: number
  readonly title: string
  readonly logFile: string
  readonly qmpSocket: string

  pid: number | undefined
  exitStatus: number | undefined
  memoryError = false
  qmpEstablished = false
  timeout: TimeoutKind | undefined

  private current: Phase = "off"
  private readonly history: Array<Phase> = ["off"]

  constructor(settings: VmSettings, paths: SessionPaths) {
    this.diskImage = settings.diskImage
    this.cmd = settings.cmd
    this.mem = settings.mem
    this.port = settings.port
    this.title = titleOf(settings.diskImage)
    this.logFile = paths.logFile
    this.qmpSocket = paths.qmpSocket
  }

  get phase(): Phase {
    return this.current
  }

  get phaseHistory(): ReadonlyArray<Phase> {
    return this.history
  }

  // Any phase may drop to off (the process went away); everything else
  // only moves forward one step.
  transition(to: Phase): void {
    if (to === "off") {
      if (this.current === "off") return
    } else if (!NEXT[this.current].includes(to)) {
      throw new InvalidTransitionError(this.current, to)
    }
    this.current = to
    this.history.push(to)
  }

  toString(): string {
    const fields = [
      `'${this.diskImage}'`,
      `mem=${this.mem}`,
      `port=${this.port}`,
      `pid=${this.pid ?? "none"}`,
      `phase='${this.current}'`,
      `qmpEstablished=${this.qmpEstablished}`,
      `exitStatus=${this.exitStatus ?? "none"}`,
    ]
    return `<VmSession(${fields.join(", ")})>`
  }
}

export function titleOf(diskImage: string): string {
  return path.parse(diskImage).name
}
