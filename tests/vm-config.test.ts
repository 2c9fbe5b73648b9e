import { test, expect } from "vitest"
import fs from "node:fs"
import path from "node:path"

import {
  lookupTarget,
  readVmConfig,
  resolveSettings,
  writeVmConfig,
} from "../src/lib/vm-config"
import { ConfigError } from "../src/lifecycle/errors"

import { makeTempDir } from "./helpers/stand-ins"

test("a missing config reads as empty", async () => {
  const file = path.join(makeTempDir(), "config.json")
  expect(await readVmConfig(file)).toEqual({ config: { names: {} }, errors: [] })
})

test("written config reads back", async () => {
  const file = path.join(makeTempDir(), "nested", "config.json")
  const config = { names: { dev: { diskImage: "/vm/dev.qcow2", mem: 4 } } }
  await writeVmConfig(file, config)

  expect(fs.readFileSync(file, "utf8")).toBe(
    '{\n    "names": {\n        "dev": {\n            "diskImage": "/vm/dev.qcow2",\n            "mem": 4\n        }\n    }\n}',
  )
  expect(await readVmConfig(file)).toEqual({ config, errors: [] })
})

test("corrupt JSON reads as empty with an error", async () => {
  const file = path.join(makeTempDir(), "config.json")
  fs.writeFileSync(file, "{ names: ")
  const { config, errors } = await readVmConfig(file)
  expect(config).toEqual({ names: {} })
  expect(errors).toHaveLength(1)
  expect(errors[0].startsWith(`${file}: `)).toBe(true)
})

test("wrong shape reads as empty with an error", async () => {
  const file = path.join(makeTempDir(), "config.json")
  fs.writeFileSync(file, '{"names": []}')
  const { config, errors } = await readVmConfig(file)
  expect(config).toEqual({ names: {} })
  expect(errors).toHaveLength(1)
  expect(errors[0].startsWith(`${file}: names: `)).toBe(true)
})

test("defaults fill in what the entry leaves out", () => {
  expect(resolveSettings({ diskImage: "/vm/a.qcow2" })).toEqual({
    diskImage: "/vm/a.qcow2",
    mem: 3,
    port: 2222,
    cmd: "qemu-system-x86_64",
  })
})

test("flags beat the entry, which beats defaults", () => {
  const config = {
    names: { dev: { diskImage: "/vm/dev.qcow2", mem: 4, port: 2300 } },
  }
  expect(lookupTarget(config, "dev", { port: 2400 })).toEqual({
    diskImage: "/vm/dev.qcow2",
    mem: 4,
    port: 2400,
    cmd: "qemu-system-x86_64",
  })
})

test("an unknown target is taken as a disk image path", () => {
  expect(lookupTarget({ names: {} }, "./scratch.img", { mem: 1 })).toEqual({
    diskImage: "./scratch.img",
    mem: 1,
    port: 2222,
    cmd: "qemu-system-x86_64",
  })
})

test("a malformed entry is a config error", () => {
  const config = { names: { dev: { mem: "lots" } } }
  expect(() => lookupTarget(config, "dev")).toThrow(ConfigError)
})
