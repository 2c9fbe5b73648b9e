import net from "node:net"
import readline from "node:readline"

import { abortable } from "../lifecycle/cancellation"

export type SocketTarget = { host: string; port: number } | { path: string }

/**
 * Open a stream connection to a TCP port or a unix socket. Rejects with the
 * socket error (ECONNREFUSED, ENOENT, ...) or with the task's cancellation.
 */
export async function openConnection(
  target: SocketTarget,
  signal: AbortSignal,
): Promise<net.Socket> {
  const socket = new net.Socket()

  const connected = new Promise<net.Socket>((resolve, reject) => {
    const onError = (error: Error) => {
      socket.destroy()
      reject(error)
    }

    socket.once("error", onError)
    const onConnect = () => {
      socket.removeListener("error", onError)
      resolve(socket)
    }

    if ("path" in target) {
      socket.connect(target.path, onConnect)
    } else {
      socket.connect(target.port, target.host, onConnect)
    }
  })

  return abortable(connected, signal, () => socket.destroy())
}

/**
 * Line-at-a-time reads from a socket. Lines are buffered between calls, so
 * nothing the peer sends is lost while the caller is busy elsewhere.
 */
export class LineReader {
  private readonly rl: readline.Interface
  private readonly lines: AsyncIterator<string>
  private failure: Error | undefined

  constructor(private readonly socket: net.Socket) {
    this.rl = readline.createInterface({ input: socket, crlfDelay: Infinity })
    this.lines = this.rl[Symbol.asyncIterator]()

    socket.on("error", (error) => {
      this.failure = error
      this.rl.close()
    })
    // A destroyed socket doesn't always emit "end"; make sure pending reads finish
    socket.once("close", () => this.rl.close())
  }

  // Resolves null at end of stream; rejects if the socket errored
  async readLine(signal: AbortSignal): Promise<string | null> {
    const next = await abortable(this.lines.next(), signal, () => this.close())
    if (next.done) {
      if (this.failure) throw this.failure
      return null
    }
    return next.value
  }

  async write(data: string): Promise<void> {
    await new Promise<void>((resolve, reject) => {
      this.socket.write(data, (error) => (error ? reject(error) : resolve()))
    })
  }

  close(): void {
    this.rl.close()
    this.socket.destroy()
  }
}
