import { TaskCancelledError } from "./errors"

// Every suspension point in a task goes through one of these helpers so that
// aborting the task's signal rejects with its TaskCancelledError.

function reasonOf(signal: AbortSignal): unknown {
  return signal.reason instanceof TaskCancelledError
    ? signal.reason
    : new TaskCancelledError("unknown")
}

export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return Promise.reject(reasonOf(signal))

  let timer: NodeJS.Timeout | undefined
  const sleep = new Promise<void>((resolve) => {
    timer = setTimeout(resolve, ms)
  })
  if (!signal) return sleep

  return abortable(sleep, signal, () => clearTimeout(timer))
}

// Settle with `promise`, unless `signal` aborts first. `onAbort` runs before
// the rejection so callers can release whatever the promise is waiting on.
export function abortable<T>(
  promise: Promise<T>,
  signal: AbortSignal,
  onAbort?: () => void,
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    if (signal.aborted) {
      onAbort?.()
      reject(reasonOf(signal))
      return
    }

    const abort = () => {
      onAbort?.()
      reject(reasonOf(signal))
    }
    signal.addEventListener("abort", abort, { once: true })

    promise.then(
      (value) => {
        signal.removeEventListener("abort", abort)
        resolve(value)
      },
      (error: unknown) => {
        signal.removeEventListener("abort", abort)
        reject(error)
      },
    )
  })
}
