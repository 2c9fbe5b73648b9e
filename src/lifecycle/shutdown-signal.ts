import { abortable } from "./cancellation"

// One-shot broadcast: raised at most once, never reset, any number of waiters.
export class ShutdownSignal {
  private raised = false
  private release: () => void = () => {}
  private readonly fired: Promise<void>

  constructor() {
    this.fired = new Promise<void>((resolve) => {
      this.release = resolve
    })
  }

  get isRaised(): boolean {
    return this.raised
  }

  // Repeated interrupts land here too; only the first one counts.
  raise(): boolean {
    if (this.raised) return false
    this.raised = true
    this.release()
    return true
  }

  wait(signal?: AbortSignal): Promise<void> {
    return signal ? abortable(this.fired, signal) : this.fired
  }
}
