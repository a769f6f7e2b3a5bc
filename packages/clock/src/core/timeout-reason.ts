import { MAX_DEADLINE_MS } from "../ports/clock"
import type { Milliseconds } from "../ports/time"

export function assertDeadlineInRange(timeoutMs: Milliseconds): void {
  if (!Number.isFinite(timeoutMs) || timeoutMs < 0 || timeoutMs > MAX_DEADLINE_MS) {
    throw new RangeError(`Deadline must be between 0 and ${MAX_DEADLINE_MS}ms, got ${timeoutMs}`)
  }
}

export function timeoutReason(timeoutMs: Milliseconds): DOMException {
  return new DOMException(`Deadline of ${timeoutMs}ms exceeded`, "TimeoutError")
}

export function isTimeoutReason(reason: unknown): boolean {
  return reason instanceof DOMException && reason.name === "TimeoutError"
}
