export interface InteractiveOptions {
  noInteractive?: boolean
  forceInteractive?: boolean
}

export const isTTY = (): boolean => Boolean(process.stdin.isTTY)

// Priority: forceInteractive -> explicit --no-interactive -> TTY detection
export const computeInteractive = (opts: InteractiveOptions = {}): boolean => {
  if (opts.forceInteractive) return true
  if (opts.noInteractive) return false
  return isTTY()
}
