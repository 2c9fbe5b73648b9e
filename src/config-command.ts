import { defineCommand } from "citty"
import consola from "consola"
import path from "node:path"

import { computeInteractive } from "./lib/interactive"
import { PATHS } from "./lib/paths"
import {
  readVmConfig,
  vmEntrySchema,
  writeVmConfig,
  type VmConfig,
  type VmEntry,
} from "./lib/vm-config"
import { ConfigError } from "./lifecycle/errors"

async function confirm(message: string, yes: boolean): Promise<boolean> {
  if (yes) return true
  if (!computeInteractive()) {
    throw new ConfigError(
      "Refusing to change the config without a terminal to confirm on; pass --yes",
    )
  }
  const answer = await consola.prompt(message, {
    type: "confirm",
    initial: false,
  })
  return answer === true
}

function requireEntry(config: VmConfig, name: string): void {
  if (!Object.hasOwn(config.names, name)) {
    throw new ConfigError(`Entry '${name}' not found`)
  }
}

export interface FormattedEntries {
  lines: Array<string>
  invalid: Array<string>
}

// name, then an indented key=value per setting, then a blank line
export function formatEntries(config: VmConfig, name?: string): FormattedEntries {
  const names = name === undefined ? Object.keys(config.names) : [name]
  const lines: Array<string> = []
  const invalid: Array<string> = []

  for (const entryName of names) {
    const value = config.names[entryName]
    if (typeof value !== "object" || value === null || Array.isArray(value)) {
      invalid.push(entryName)
      continue
    }
    lines.push(entryName)
    for (const [key, setting] of Object.entries(value)) {
      lines.push(`    ${key}=${String(setting)}`)
    }
    lines.push("")
  }
  return { lines, invalid }
}

export function withEntry(config: VmConfig, name: string, entry: VmEntry): VmConfig {
  return { names: { ...config.names, [name]: entry } }
}

export function withoutEntry(config: VmConfig, name?: string): VmConfig {
  if (name === undefined) return { names: {} }
  const { [name]: _removed, ...rest } = config.names
  return { names: rest }
}

const nameArg = {
  type: "positional",
  description: "Name assigned to the VM definition / disk image",
} as const

const add = defineCommand({
  meta: { name: "add", description: "Add or update a VM configuration" },
  args: {
    name: { ...nameArg, required: true },
    diskImage: {
      type: "positional",
      required: true,
      description: "Path to the disk image",
    },
    mem: { alias: "m", type: "string", description: "Guest memory in GB" },
    port: { alias: "p", type: "string", description: "Forwarded ssh port" },
    cmd: { alias: "c", type: "string", description: "Hypervisor binary" },
    yes: { alias: "y", type: "boolean", default: false, description: "Don't ask" },
  },
  async run({ args }) {
    const { config, errors } = await readVmConfig(PATHS.CONFIG_PATH)
    if (errors.length > 0) {
      throw new ConfigError(
        `Can't update corrupt config; delete it (or fix it manually) first:\n${errors.join("\n")}`,
      )
    }

    const mem: string | undefined = args.mem
    const port: string | undefined = args.port
    const cmd: string | undefined = args.cmd
    const parsed = vmEntrySchema.safeParse({
      diskImage: path.resolve(args.diskImage),
      mem: mem === undefined ? undefined : Number(mem),
      port: port === undefined ? undefined : Number(port),
      cmd,
    })
    if (!parsed.success) {
      throw new ConfigError(
        `Invalid settings: ${parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}`,
      )
    }

    if (Object.hasOwn(config.names, args.name)) {
      if (!(await confirm(`Replace existing entry ${args.name}?`, args.yes))) {
        consola.info("Aborted")
        return
      }
    }

    await writeVmConfig(PATHS.CONFIG_PATH, withEntry(config, args.name, parsed.data))
    consola.success(`Saved ${args.name}`)
  },
})

const del = defineCommand({
  meta: { name: "del", description: "Delete one, or all, VM configurations" },
  args: {
    name: nameArg,
    yes: { alias: "y", type: "boolean", default: false, description: "Don't ask" },
  },
  async run({ args }) {
    const name: string | undefined = args.name
    const { config } = await readVmConfig(PATHS.CONFIG_PATH)
    if (name !== undefined) requireEntry(config, name)

    const question =
      name === undefined ? "Delete ALL config entries?" : `Delete entry ${name}?`
    if (!(await confirm(question, args.yes))) {
      consola.info("Aborted")
      return
    }

    await writeVmConfig(PATHS.CONFIG_PATH, withoutEntry(config, name))
  },
})

const list = defineCommand({
  meta: { name: "list", description: "List VM configurations" },
  args: { name: nameArg },
  async run({ args }) {
    const name: string | undefined = args.name
    const { config, errors } = await readVmConfig(PATHS.CONFIG_PATH)
    for (const error of errors) consola.warn(error)
    if (name !== undefined) requireEntry(config, name)

    const { lines, invalid } = formatEntries(config, name)
    for (const entry of invalid) consola.error(`Invalid entry for '${entry}'`)
    for (const line of lines) consola.log(line)
  },
})

export const config = defineCommand({
  meta: {
    name: "config",
    description: "Maintain named VM definitions so disk image paths stay put",
  },
  subCommands: { add, del, list },
})
