import { assertDeadlineInRange, timeoutReason } from "../core/timeout-reason"
import type { Clock, Deadline } from "../ports/clock"
import type { Milliseconds } from "../ports/time"

type PendingDeadline = {
  firesAt: Milliseconds
  timeoutMs: Milliseconds
  controller: AbortController
}

export class FakeClock implements Clock {
  private time: Milliseconds
  private readonly pending = new Set<PendingDeadline>()

  constructor(start: Milliseconds = 0) {
    this.time = start
  }

  now(): Date {
    return new Date(this.time)
  }

  nowMs(): Milliseconds {
    return this.time
  }

  /** Moves time forward and fires every deadline that is now due. */
  advance(ms: Milliseconds): void {
    this.set(this.time + ms)
  }

  set(ms: Milliseconds): void {
    this.time = ms
    this.fireDue()
  }

  deadline(timeoutMs: Milliseconds): Deadline {
    assertDeadlineInRange(timeoutMs)

    const entry: PendingDeadline = {
      firesAt: this.time + timeoutMs,
      timeoutMs,
      controller: new AbortController(),
    }

    this.pending.add(entry)
    this.fireDue()

    return {
      signal: entry.controller.signal,
      timeoutMs,
      clear: () => {
        this.pending.delete(entry)
      },
    }
  }

  /** Number of armed deadlines that have neither fired nor been cleared. */
  pendingDeadlines(): number {
    return this.pending.size
  }

  private fireDue(): void {
    for (const entry of [...this.pending]) {
      if (entry.firesAt > this.time) continue

      this.pending.delete(entry)
      entry.controller.abort(timeoutReason(entry.timeoutMs))
    }
  }
}
