import consola from "consola"
import { z } from "zod"

import { LineReader, openConnection } from "../lib/socket"

import { ProtocolError } from "./errors"

const qmpMessageSchema = z.record(z.string(), z.unknown())

export type QmpMessage = z.infer<typeof qmpMessageSchema>

function parseMessage(line: string): QmpMessage {
  let parsed: unknown
  try {
    parsed = JSON.parse(line)
  } catch (error) {
    throw new ProtocolError(
      `Malformed QMP reply ${JSON.stringify(line)}: ${error instanceof Error ? error.message : String(error)}`,
    )
  }
  const message = qmpMessageSchema.safeParse(parsed)
  if (!message.success) {
    throw new ProtocolError(`Unexpected QMP reply ${JSON.stringify(line)}`)
  }
  return message.data
}

function isEmptyObject(value: unknown): boolean {
  return (
    typeof value === "object"
    && value !== null
    && !Array.isArray(value)
    && Object.keys(value).length === 0
  )
}

/**
 * Client for QEMU's machine protocol: newline-delimited JSON over a unix
 * socket. One instance is one connection; nothing is retried, because an
 * unrecognised reply is not something we can safely guess our way around.
 */
export class QmpClient {
  private constructor(
    readonly socketPath: string,
    private readonly reader: LineReader,
  ) {}

  static async connect(
    socketPath: string,
    signal: AbortSignal,
  ): Promise<QmpClient> {
    const socket = await openConnection({ path: socketPath }, signal)
    return new QmpClient(socketPath, new LineReader(socket))
  }

  // Consume the greeting, then enter command mode
  async negotiate(signal: AbortSignal): Promise<void> {
    const greeting = await this.reader.readLine(signal)
    if (greeting === null) {
      throw new ProtocolError(`QMP server at ${this.socketPath} closed before greeting`)
    }
    consola.debug("QMP greeting:", greeting)

    const reply = await this.execute("qmp_capabilities", signal)
    if (!("return" in reply) || !isEmptyObject(reply.return)) {
      throw new ProtocolError(
        `Failed to establish QMP connection at ${this.socketPath}: ${JSON.stringify(reply)}`,
      )
    }
  }

  // Send a command and return the next message, whatever it is
  async execute(command: string, signal: AbortSignal): Promise<QmpMessage> {
    await this.send(command)
    return this.readMessage(signal)
  }

  async send(command: string): Promise<void> {
    await this.reader.write(`{"execute": "${command}"}\r\n`)
  }

  // Skip everything (other events, command returns) until the named event
  async waitForEvent(name: string, signal: AbortSignal): Promise<QmpMessage> {
    for (;;) {
      const message = await this.readMessage(signal)
      if (message.event === name) return message
      consola.debug("Ignoring QMP message:", message)
    }
  }

  close(): void {
    this.reader.close()
  }

  private async readMessage(signal: AbortSignal): Promise<QmpMessage> {
    const line = await this.reader.readLine(signal)
    if (line === null) {
      throw new ProtocolError(`QMP connection at ${this.socketPath} closed unexpectedly`)
    }
    return parseMessage(line)
  }
}
