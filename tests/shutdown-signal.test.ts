import { test, expect } from "vitest"

import { delay } from "../src/lifecycle/cancellation"
import { TaskCancelledError } from "../src/lifecycle/errors"
import { ShutdownSignal } from "../src/lifecycle/shutdown-signal"

test("raising twice is the same as raising once", async () => {
  const shutdown = new ShutdownSignal()
  let wakeups = 0
  const waiters = [shutdown.wait(), shutdown.wait()].map((p) =>
    p.then(() => {
      wakeups += 1
    }),
  )

  expect(shutdown.isRaised).toBe(false)
  expect(shutdown.raise()).toBe(true)
  expect(shutdown.raise()).toBe(false)
  await Promise.all(waiters)

  expect(wakeups).toBe(2)
  expect(shutdown.isRaised).toBe(true)
  // Late waiters return straight away
  await shutdown.wait()
})

test("a waiter can be cancelled without affecting the signal", async () => {
  const shutdown = new ShutdownSignal()
  const controller = new AbortController()
  const waiting = shutdown.wait(controller.signal)

  await delay(1)
  controller.abort(new TaskCancelledError("shutdown"))

  await expect(waiting).rejects.toBeInstanceOf(TaskCancelledError)
  expect(shutdown.isRaised).toBe(false)
})
