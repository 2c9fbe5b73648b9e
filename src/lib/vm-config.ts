import fs from "node:fs/promises"
import path from "node:path"
import { z } from "zod"

import { ConfigError } from "../lifecycle/errors"
import type { VmSettings } from "../lifecycle/types"

import { DEFAULT_COMMAND } from "./qemu-args"

export const DEFAULT_MEM_GB = 3
export const DEFAULT_PORT = 2222

const INDENT = 4

export const vmEntrySchema = z.object({
  diskImage: z.string().min(1),
  mem: z.number().positive().optional(),
  port: z.number().int().min(1).max(65535).optional(),
  cmd: z.string().min(1).optional(),
})

export type VmEntry = z.infer<typeof vmEntrySchema>

// Entries are kept loose here so that one bad entry doesn't hide the rest
const configSchema = z.object({
  names: z.record(z.string(), z.unknown()),
})

export interface VmConfig {
  names: Record<string, unknown>
}

export interface ConfigReadResult {
  config: VmConfig
  errors: Array<string>
}

export function emptyConfig(): VmConfig {
  return { names: {} }
}

// A missing file is an empty config. A corrupt one is also read as empty,
// with the reasons in `errors`, so that callers can refuse to overwrite it.
export async function readVmConfig(filePath: string): Promise<ConfigReadResult> {
  let raw: string
  try {
    raw = await fs.readFile(filePath, "utf8")
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return { config: emptyConfig(), errors: [] }
    }
    throw err
  }

  let json: unknown
  try {
    json = JSON.parse(raw)
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err)
    return { config: emptyConfig(), errors: [`${filePath}: ${reason}`] }
  }

  const parsed = configSchema.safeParse(json)
  if (!parsed.success) {
    return {
      config: emptyConfig(),
      errors: parsed.error.issues.map(
        (issue) => `${filePath}: ${issue.path.join(".") || "(root)"}: ${issue.message}`,
      ),
    }
  }
  return { config: { names: parsed.data.names }, errors: [] }
}

export async function writeVmConfig(
  filePath: string,
  config: VmConfig,
): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true })
  await fs.writeFile(filePath, JSON.stringify(config, null, INDENT))
}

export function parseEntry(name: string, value: unknown): VmEntry {
  const parsed = vmEntrySchema.safeParse(value)
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid entry for '${name}': ${parsed.error.issues.map((i) => i.message).join("; ")}`,
    )
  }
  return parsed.data
}

export interface SettingsOverrides {
  mem?: number
  port?: number
  cmd?: string
}

// Explicit flags win over the configured entry, which wins over defaults
export function resolveSettings(
  base: VmEntry,
  overrides: SettingsOverrides = {},
): VmSettings {
  return {
    diskImage: base.diskImage,
    mem: overrides.mem ?? base.mem ?? DEFAULT_MEM_GB,
    port: overrides.port ?? base.port ?? DEFAULT_PORT,
    cmd: overrides.cmd ?? base.cmd ?? DEFAULT_COMMAND,
  }
}

// `target` is either a configured name or a path to a disk image
export function lookupTarget(
  config: VmConfig,
  target: string,
  overrides: SettingsOverrides = {},
): VmSettings {
  if (Object.hasOwn(config.names, target)) {
    return resolveSettings(parseEntry(target, config.names[target]), overrides)
  }
  return resolveSettings({ diskImage: target }, overrides)
}
