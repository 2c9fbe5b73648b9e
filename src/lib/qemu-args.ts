import type { VmSession } from "../lifecycle/session"

export const DEFAULT_COMMAND = "qemu-system-x86_64"

// Arguments for a headless q35 guest with its sshd forwarded to a host port
// and QMP listening on a private unix socket.
export function buildQemuArgs(
  session: Pick<VmSession, "diskImage" | "mem" | "port" | "title" | "qmpSocket">,
): Array<string> {
  return [
    "-m", `${session.mem}G`,
    "-hda", session.diskImage,
    "-name", session.title,
    "-machine", "q35",
    "-smp", "2",
    "-vga", "none",
    "-nographic",
    "-boot", "menu=off",
    "-qmp", `unix:${session.qmpSocket},server,nowait`,
    "-device", "e1000,netdev=net0",
    "-netdev", `user,id=net0,hostfwd=tcp:127.0.0.1:${session.port}-:22`,
  ]
}
