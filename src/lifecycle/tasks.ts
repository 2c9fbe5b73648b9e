import invariant from "tiny-invariant"

import { abortable } from "./cancellation"
import { isCancellation, TaskCancelledError } from "./errors"

export type TaskFn = (signal: AbortSignal) => Promise<void>

export type TaskOutcome<N extends string> =
  | { name: N; status: "fulfilled" }
  | { name: N; status: "cancelled" }
  | { name: N; status: "failed"; error: unknown }

interface TaskEntry<N extends string> {
  controller: AbortController
  promise: Promise<void>
  outcome: Promise<TaskOutcome<N>>
}

// Named, individually cancellable tasks. Bodies start on a microtask so the
// whole set is registered before any of them runs; cancelling a task that is
// unknown, finished or already cancelled does nothing.
export class TaskSet<N extends string> {
  private readonly entries = new Map<N, TaskEntry<N>>()

  spawn(name: N, fn: TaskFn): void {
    invariant(!this.entries.has(name), `Task ${name} already exists`)

    const controller = new AbortController()
    const { signal } = controller

    const promise = Promise.resolve().then(() => {
      if (signal.aborted) throw new TaskCancelledError(name)
      return fn(signal)
    })

    const outcome = promise.then(
      (): TaskOutcome<N> => ({ name, status: "fulfilled" }),
      (error: unknown): TaskOutcome<N> =>
        isCancellation(error)
          ? { name, status: "cancelled" }
          : { name, status: "failed", error },
    )

    this.entries.set(name, { controller, promise, outcome })
  }

  has(name: N): boolean {
    return this.entries.has(name)
  }

  isCancelled(name: N): boolean {
    return this.entries.get(name)?.controller.signal.aborted ?? false
  }

  // No names means every task
  cancel(...names: Array<N>): void {
    const targets = names.length > 0 ? names : [...this.entries.keys()]
    for (const name of targets) {
      const entry = this.entries.get(name)
      if (!entry || entry.controller.signal.aborted) continue
      entry.controller.abort(new TaskCancelledError(name))
    }
  }

  // Wait for another task to finish. A cancelled or failed task propagates
  // its error to the waiter, as does cancelling the waiter itself.
  completion(name: N, signal?: AbortSignal): Promise<void> {
    const entry = this.entries.get(name)
    invariant(entry, `Unknown task ${name}`)
    return signal ? abortable(entry.promise, signal) : entry.promise
  }

  // Settles once every task has, whatever each outcome was
  join(): Promise<Array<TaskOutcome<N>>> {
    return Promise.all([...this.entries.values()].map((entry) => entry.outcome))
  }
}
