import { type Clock, type Deadline, isTimeoutReason, type Milliseconds } from "@stowage/clock"
import { StorageError, type StorageErrorContext } from "@stowage/storage"

export type DeadlineOptions = {
  timeoutMs: Milliseconds
  /** Caller cancellation, combined with the deadline */
  signal?: AbortSignal | undefined
  context: StorageErrorContext
}

const ABORTED = Symbol("aborted")

/**
 * Runs `fn` with a signal that aborts when either the caller's signal does
 * or `timeoutMs` elapses on `clock`. Settles as soon as the signal aborts,
 * even if `fn` ignores it.
 *
 * Deadline expiry (ours, or a caller signal aborted with a TimeoutError)
 * rejects with `operation_timeout`; any other caller abort with
 * `operation_aborted`. Other failures pass through.
 */
export async function withDeadline<T>(
  clock: Clock,
  options: DeadlineOptions,
  fn: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const deadline = clock.deadline(options.timeoutMs)
  const signal = options.signal
    ? AbortSignal.any([options.signal, deadline.signal])
    : deadline.signal

  let onAbort: (() => void) | undefined

  const aborted = new Promise<typeof ABORTED>((resolve) => {
    onAbort = () => resolve(ABORTED)
    signal.addEventListener("abort", onAbort, { once: true })
  })

  let outcome: T | typeof ABORTED

  try {
    outcome = signal.aborted ? ABORTED : await Promise.race([fn(signal), aborted])
  } catch (err) {
    throw classifyFailure(err, options, deadline)
  } finally {
    deadline.clear()
    if (onAbort) signal.removeEventListener("abort", onAbort)
  }

  if (outcome === ABORTED) throw classifyFailure(signal.reason, options, deadline)

  return outcome
}

function classifyFailure(err: unknown, options: DeadlineOptions, deadline: Deadline): unknown {
  const callerSignal = options.signal

  if (deadline.signal.aborted || (callerSignal?.aborted && isTimeoutReason(callerSignal.reason))) {
    return StorageError.operationTimeout(options.context, options.timeoutMs, err)
  }

  if (callerSignal?.aborted) {
    return StorageError.operationAborted(options.context, err)
  }

  return err
}
