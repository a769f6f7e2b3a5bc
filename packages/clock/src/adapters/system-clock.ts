import { assertDeadlineInRange, timeoutReason } from "../core/timeout-reason"
import type { Clock, Deadline } from "../ports/clock"
import type { Milliseconds } from "../ports/time"

export class SystemClock implements Clock {
  now(): Date {
    return new Date()
  }

  nowMs(): Milliseconds {
    return Date.now()
  }

  deadline(timeoutMs: Milliseconds): Deadline {
    assertDeadlineInRange(timeoutMs)

    const controller = new AbortController()

    // unref: a pending deadline must not keep the process alive
    const timer = setTimeout(() => controller.abort(timeoutReason(timeoutMs)), timeoutMs)
    timer.unref()

    return {
      signal: controller.signal,
      timeoutMs,
      clear: () => clearTimeout(timer),
    }
  }
}
