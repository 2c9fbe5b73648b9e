import consola from "consola"

import { SessionLog } from "../lib/session-log"

import { probeBoot } from "./boot-probe"
import { describeError } from "./errors"
import { PROGRESS_INTERVAL_MS, reportProgress } from "./progress"
import { VmSession } from "./session"
import { negotiateShutdown } from "./shutdown"
import { ShutdownSignal } from "./shutdown-signal"
import { spawnHypervisor, superviseProcess } from "./supervisor"
import { TaskSet } from "./tasks"
import type {
  ControllerOptions,
  RunResult,
  TaskContext,
  TaskFailure,
  TaskName,
} from "./types"
import {
  BOOT_TIMEOUT_MS,
  bootWatchdog,
  SHUTDOWN_TIMEOUT_MS,
  shutdownWatchdog,
} from "./watchdogs"

export const PROBE_INTERVAL_MS = 1000

const HANDLED_SIGNALS: ReadonlyArray<NodeJS.Signals> = ["SIGINT", "SIGTERM"]

// Lifecycle owner for a single VM run.
// - Owns the session (the only shared mutable state) and the task set
// - Turns SIGINT/SIGTERM into the one-shot shutdown request
// - Joins every task and keeps their failures out of each other's way
export class VmController {
  readonly session: VmSession
  readonly log: SessionLog
  private readonly shutdown = new ShutdownSignal()
  private readonly tasks = new TaskSet<TaskName>()
  private started = false

  constructor(private readonly opts: ControllerOptions) {
    this.session = new VmSession(opts, {
      logFile: opts.logFile,
      qmpSocket: opts.qmpSocket,
    })
    this.log = new SessionLog(opts.logFile)
  }

  get shutdownRequested(): boolean {
    return this.shutdown.isRaised
  }

  // Safe to call any number of times, from anywhere
  requestShutdown(): void {
    if (this.shutdown.raise()) {
      consola.debug("Shutdown request raised")
    }
  }

  private readonly handleSignal = (signal: NodeJS.Signals) => {
    consola.debug("Signal received:", signal)
    this.requestShutdown()
  }

  async run(): Promise<RunResult> {
    if (this.started) {
      throw new Error(`Cannot start from phase ${this.session.phase}`)
    }
    this.started = true

    // Recreate the log rather than truncating it, so that QEMU's
    // descriptor and ours are both plain appends
    await this.log.reset()

    const installHandlers = this.opts.installSignalHandlers ?? true
    if (installHandlers) {
      for (const signal of HANDLED_SIGNALS) process.on(signal, this.handleSignal)
    }

    try {
      this.session.transition("booting")
      this.startTasks()

      this.log.write("", { timestamp: false })
      this.log.write("Starting supervision")

      const outcomes = await this.tasks.join()

      this.log.write(String(this.session))

      const failures: Array<TaskFailure> = []
      for (const outcome of outcomes) {
        if (outcome.status === "failed") {
          failures.push({ task: outcome.name, error: outcome.error })
          consola.debug(`Task ${outcome.name} failed:`, outcome.error)
        }
      }
      if (failures.length > 0) this.recordFailures(failures)

      return {
        phase: this.session.phase,
        pid: this.session.pid,
        exitStatus: this.session.exitStatus,
        memoryError: this.session.memoryError,
        qmpEstablished: this.session.qmpEstablished,
        timeout: this.session.timeout,
        failures,
        logFile: this.session.logFile,
      }
    } finally {
      if (installHandlers) {
        for (const signal of HANDLED_SIGNALS) process.off(signal, this.handleSignal)
      }
    }
  }

  private startTasks(): void {
    const ctx: TaskContext = {
      session: this.session,
      tasks: this.tasks,
      shutdown: this.shutdown,
      log: this.log,
    }
    const opts = this.opts

    this.tasks.spawn(
      "supervisor",
      superviseProcess(ctx, {
        launcher: opts.launcher ?? spawnHypervisor,
        onTimeout: opts.onTimeout ?? "abandon",
      }),
    )
    this.tasks.spawn(
      "bootProbe",
      probeBoot(ctx, opts.probeIntervalMs ?? PROBE_INTERVAL_MS),
    )
    this.tasks.spawn(
      "progress",
      reportProgress(
        ctx,
        opts.progressStream === undefined ? process.stdout : opts.progressStream,
        opts.progressIntervalMs ?? PROGRESS_INTERVAL_MS,
      ),
    )
    this.tasks.spawn(
      "bootWatchdog",
      bootWatchdog(ctx, opts.bootTimeoutMs ?? BOOT_TIMEOUT_MS),
    )
    this.tasks.spawn("shutdown", negotiateShutdown(ctx))
    this.tasks.spawn(
      "shutdownWatchdog",
      shutdownWatchdog(ctx, opts.shutdownTimeoutMs ?? SHUTDOWN_TIMEOUT_MS),
    )
  }

  private recordFailures(failures: Array<TaskFailure>): void {
    const details = failures
      .map(({ task, error }) => `\n[${task}] ${describeError(error)}\n`)
      .join("")
    this.log.write(
      `${"-".repeat(78)}\nErrors were produced while supervising the VM:\n${details}`,
      { timestamp: false },
    )
  }
}
