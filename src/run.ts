import { defineCommand } from "citty"
import consola from "consola"
import fs from "node:fs/promises"

import { computeInteractive } from "./lib/interactive"
import { logFileFor, PATHS, qmpSocketPath } from "./lib/paths"
import { buildReport } from "./lib/report"
import { lookupTarget, readVmConfig } from "./lib/vm-config"
import { VmController } from "./lifecycle/controller"
import { ConfigError } from "./lifecycle/errors"
import { isProcessAlive } from "./lifecycle/pid"
import { titleOf } from "./lifecycle/session"
import type { TimeoutPolicy } from "./lifecycle/types"

export interface RunVmOptions {
  target: string
  mem?: number
  port?: number
  cmd?: string
  onTimeout: TimeoutPolicy
  verbose: boolean
  interactive?: boolean
}

// Resolves to the exit code the CLI should finish with
export async function runVm(options: RunVmOptions): Promise<number> {
  if (options.verbose) {
    consola.level = 5
    consola.info("Verbose logging enabled")
  }

  // Without a terminal the b/r/s heartbeat is just noise in someone's log
  const interactive = computeInteractive({
    forceInteractive: options.interactive === true,
    noInteractive: options.interactive === false,
  })

  const { config, errors } = await readVmConfig(PATHS.CONFIG_PATH)
  for (const error of errors) {
    consola.warn(`Ignoring unreadable config: ${error}`)
  }

  const settings = lookupTarget(config, options.target, {
    mem: options.mem,
    port: options.port,
    cmd: options.cmd,
  })

  try {
    await fs.access(settings.diskImage)
  } catch {
    throw new ConfigError(
      `'${options.target}' is neither a configured VM nor an existing disk image`,
    )
  }

  const title = titleOf(settings.diskImage)
  const controller = new VmController({
    ...settings,
    logFile: logFileFor(title),
    qmpSocket: qmpSocketPath(),
    onTimeout: options.onTimeout,
    progressStream: interactive ? process.stdout : null,
  })

  consola.info(
    `Starting VM ${title} (${settings.mem}GB, ssh on localhost:${settings.port})`,
  )
  consola.info("Press Ctrl-C to shut it down")

  const result = await controller.run()

  if (result.failures.length > 0) {
    const tasks = result.failures.map((failure) => failure.task).join(", ")
    consola.warn(`Supervising tasks failed (${tasks}); details in ${result.logFile}`)
  }

  const report = buildReport(result, {
    mem: settings.mem,
    isAlive: isProcessAlive,
  })
  for (const message of report.messages) {
    if (report.success) {
      consola.success(message)
    } else {
      consola.error(message)
    }
    controller.log.write(`\n${message}`, { timestamp: false })
  }

  return report.exitCode
}

function parseNumberArg(
  name: string,
  raw: string | undefined,
  { integer = false } = {},
): number | undefined {
  if (raw === undefined || raw === "") return undefined
  const value = Number(raw)
  if (!Number.isFinite(value) || value <= 0 || (integer && !Number.isInteger(value))) {
    throw new ConfigError(`Invalid --${name}: ${raw}`)
  }
  return value
}

function parseTimeoutPolicy(raw: string): TimeoutPolicy {
  if (raw === "abandon" || raw === "terminate") return raw
  throw new ConfigError(`Invalid --on-timeout: ${raw} (expected abandon or terminate)`)
}

export const run = defineCommand({
  meta: {
    name: "run",
    description: "Boot a VM and shut it down gracefully on Ctrl-C",
  },
  args: {
    target: {
      type: "positional",
      required: true,
      description: "Configured VM name, or path to a disk image",
    },
    mem: {
      alias: "m",
      type: "string",
      description: "Guest memory in GB (default 3)",
    },
    port: {
      alias: "p",
      type: "string",
      description: "Host port forwarded to the guest's ssh (default 2222)",
    },
    cmd: {
      alias: "c",
      type: "string",
      description: "Hypervisor binary (default qemu-system-x86_64)",
    },
    "on-timeout": {
      type: "string",
      default: "abandon",
      description:
        "What to do with the VM process if boot or shutdown times out: abandon or terminate",
    },
    verbose: {
      alias: "v",
      type: "boolean",
      default: false,
      description: "Enable verbose logging",
    },
    interactive: {
      type: "boolean",
      description:
        "Force the progress display on, or off with --no-interactive (default: on for a TTY)",
    },
  },
  async run({ args }) {
    const mem: string | undefined = args.mem
    const port: string | undefined = args.port
    const cmd: string | undefined = args.cmd
    const interactive: boolean | undefined = args.interactive

    process.exitCode = await runVm({
      target: args.target,
      mem: parseNumberArg("mem", mem),
      port: parseNumberArg("port", port, { integer: true }),
      cmd: cmd || undefined,
      onTimeout: parseTimeoutPolicy(args["on-timeout"]),
      verbose: args.verbose,
      interactive,
    })
  },
})
