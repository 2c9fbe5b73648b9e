import { test, expect, afterEach } from "vitest"

import { checkSsh, probeBoot } from "../src/lifecycle/boot-probe"
import { delay } from "../src/lifecycle/cancellation"
import { BootProbeError } from "../src/lifecycle/errors"

import {
  closedPort,
  makeContext,
  makeTempDir,
  readLog,
  startSshStandIn,
  type SshStandIn,
} from "./helpers/stand-ins"

let standIn: SshStandIn | undefined

afterEach(async () => {
  await standIn?.close()
  standIn = undefined
})

const BANNER = "SSH-2.0-OpenSSH_9.6p1 Debian-4"

test("checkSsh accepts the ssh banner", async () => {
  standIn = await startSshStandIn(() => `${BANNER}\r\n`)
  const reply = await checkSsh(standIn.port, new AbortController().signal)
  expect(reply).toBe(BANNER)
})

test("checkSsh rejects a foreign banner", async () => {
  standIn = await startSshStandIn(() => "220 smtp ready\r\n")
  await expect(
    checkSsh(standIn.port, new AbortController().signal),
  ).rejects.toThrow(BootProbeError)
})

test("checkSsh treats a silent hang-up as a bad reply", async () => {
  standIn = await startSshStandIn(() => "")
  await expect(
    checkSsh(standIn.port, new AbortController().signal),
  ).rejects.toThrow('Bad reply "" from guest ssh service')
})

test("checkSsh surfaces a refused connection", async () => {
  const port = await closedPort()
  await expect(
    checkSsh(port, new AbortController().signal),
  ).rejects.toMatchObject({ code: "ECONNREFUSED" })
})

test("probe retries until the banner appears, then cancels the boot watchdog", async () => {
  standIn = await startSshStandIn((attempt) =>
    attempt < 3 ? "garbage\r\n" : `${BANNER}\r\n`,
  )
  const ctx = makeContext(makeTempDir(), standIn.port)
  ctx.session.transition("booting")

  ctx.tasks.spawn("bootWatchdog", async (signal) => {
    await delay(60_000, signal)
  })
  ctx.tasks.spawn("bootProbe", probeBoot(ctx, 20))

  const outcomes = await ctx.tasks.join()

  expect(outcomes).toEqual([
    { name: "bootWatchdog", status: "cancelled" },
    { name: "bootProbe", status: "fulfilled" },
  ])
  expect(ctx.session.phaseHistory).toEqual(["off", "booting", "running"])
  expect(standIn.attempts).toHaveLength(3)
  for (let i = 1; i < standIn.attempts.length; i++) {
    expect(standIn.attempts[i] - standIn.attempts[i - 1]).toBeGreaterThanOrEqual(15)
  }

  const log = readLog(ctx.session.logFile)
  expect(log.match(/Attempt ssh connection/g)).toHaveLength(3)
  expect(log).toContain(`Reply "garbage" from guest ssh service`)
  expect(log).toContain("Guest ssh service is up")
})

test("probe keeps retrying a closed port until cancelled", async () => {
  const ctx = makeContext(makeTempDir(), await closedPort())
  ctx.session.transition("booting")
  ctx.tasks.spawn("bootProbe", probeBoot(ctx, 10))

  await delay(80)
  ctx.tasks.cancel("bootProbe")

  expect(await ctx.tasks.join()).toEqual([{ name: "bootProbe", status: "cancelled" }])
  expect(ctx.session.phase).toBe("booting")
  const attempts = readLog(ctx.session.logFile).match(/Attempt ssh connection/g)
  expect(attempts?.length).toBeGreaterThan(1)
})

test("probe returns quietly if the phase moves on without it", async () => {
  const ctx = makeContext(makeTempDir(), await closedPort())
  ctx.session.transition("booting")
  ctx.tasks.spawn("bootProbe", probeBoot(ctx, 10))

  await delay(20)
  ctx.session.transition("off")

  expect(await ctx.tasks.join()).toEqual([{ name: "bootProbe", status: "fulfilled" }])
})
