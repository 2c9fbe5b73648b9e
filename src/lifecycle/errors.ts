import type { Phase } from "./types"

// Raised into a task when it is cancelled. The task set counts it as a
// cancellation, never as a failure.
export class TaskCancelledError extends Error {
  constructor(readonly task: string) {
    super(`Task ${task} was cancelled`)
    this.name = "TaskCancelledError"
  }
}

// The QMP server replied with something we don't recognise. Not retried.
export class ProtocolError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "ProtocolError"
  }
}

// The guest's ssh port answered with the wrong banner (or nothing at all)
export class BootProbeError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "BootProbeError"
  }
}

export class InvalidTransitionError extends Error {
  constructor(
    readonly from: Phase,
    readonly to: Phase,
  ) {
    super(`Invalid VM phase transition: ${from} -> ${to}`)
    this.name = "InvalidTransitionError"
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "ConfigError"
  }
}

export function isCancellation(error: unknown): error is TaskCancelledError {
  return error instanceof TaskCancelledError
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.stack ?? `${error.name}: ${error.message}`
  return String(error)
}
