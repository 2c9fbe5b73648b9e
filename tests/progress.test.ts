import { test, expect, afterEach, vi } from "vitest"
import { Writable } from "node:stream"

import { delay } from "../src/lifecycle/cancellation"
import { phaseChar, reportProgress } from "../src/lifecycle/progress"
import { PHASES } from "../src/lifecycle/types"

import { makeContext, makeTempDir, readLog } from "./helpers/stand-ins"

afterEach(() => {
  vi.useRealTimers()
})

function collector() {
  const chunks: Array<string> = []
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk.toString("utf8"))
      callback()
    },
  })
  return { stream, text: () => chunks.join("") }
}

test("one character per tick, and the shutdown notice exactly once", async () => {
  vi.useFakeTimers()
  const ctx = makeContext(makeTempDir())
  const out = collector()
  ctx.session.transition("booting")
  ctx.tasks.spawn("progress", reportProgress(ctx, out.stream))

  await vi.advanceTimersByTimeAsync(0)
  ctx.session.transition("running")
  await vi.advanceTimersByTimeAsync(1000)

  ctx.shutdown.raise()
  await vi.advanceTimersByTimeAsync(1000)
  ctx.shutdown.raise()
  await vi.advanceTimersByTimeAsync(1000)

  ctx.session.transition("shutting_down")
  await vi.advanceTimersByTimeAsync(1000)
  ctx.session.transition("off")
  await vi.advanceTimersByTimeAsync(1000)

  expect(await ctx.tasks.join()).toEqual([{ name: "progress", status: "fulfilled" }])
  expect(out.text()).toBe("brr\nrs\n")
  expect(readLog(ctx.session.logFile).match(/Shutdown requested/g)).toHaveLength(1)
})

test("a quiet reporter still notices the shutdown request", async () => {
  vi.useFakeTimers()
  const ctx = makeContext(makeTempDir())
  ctx.session.transition("booting")
  ctx.shutdown.raise()
  ctx.tasks.spawn("progress", reportProgress(ctx, null, 500))

  await vi.advanceTimersByTimeAsync(0)
  ctx.session.transition("off")
  await vi.advanceTimersByTimeAsync(500)

  expect(await ctx.tasks.join()).toEqual([{ name: "progress", status: "fulfilled" }])
  expect(readLog(ctx.session.logFile)).toContain("Shutdown requested")
})

test("a failing output stream stops the display without failing the run", async () => {
  let attempts = 0
  const broken = new Writable({
    write(_chunk, _encoding, callback) {
      attempts += 1
      callback(new Error("write EPIPE"))
    },
  })
  const ctx = makeContext(makeTempDir())
  ctx.session.transition("booting")
  ctx.tasks.spawn("progress", reportProgress(ctx, broken, 10))

  await delay(50)
  ctx.session.transition("off")

  expect(await ctx.tasks.join()).toEqual([{ name: "progress", status: "fulfilled" }])
  expect(attempts).toBe(1)
})

test("phase characters", () => {
  expect(PHASES.map(phaseChar)).toEqual(["o", "b", "r", "s"])
})
