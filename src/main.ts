#!/usr/bin/env node

import { defineCommand, runMain } from "citty"

import { config } from "./config-command"
import { run } from "./run"

const main = defineCommand({
  meta: {
    name: "vmwarden",
    version: "0.1.0",
    description: "Supervise a QEMU VM from boot to graceful power-down",
  },
  subCommands: { run, config },
})

void runMain(main)
