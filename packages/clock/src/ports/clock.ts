import type { Milliseconds } from "./time"

export type TimeSource = {
  /**
   * Current time as a Date object.
   *
   * @remarks
   * Avoid for arithmetic; prefer `nowMs()` for calculations.
   */
  now(): Date

  /** Current time as milliseconds since Unix epoch. */
  nowMs(): Milliseconds
}

/**
 * A one-shot timer exposed as an AbortSignal.
 *
 * `signal` aborts with a `TimeoutError` DOMException once the budget elapses.
 * `clear()` disarms the timer; a cleared deadline never fires.
 */
export interface Deadline {
  readonly signal: AbortSignal
  readonly timeoutMs: Milliseconds
  clear(): void
}

/** Longest delay a Node timer honours; larger values fire after 1ms. */
export const MAX_DEADLINE_MS: Milliseconds = 2_147_483_647

export interface DeadlineSource {
  /** Throws RangeError unless `timeoutMs` is in 0..MAX_DEADLINE_MS. */
  deadline(timeoutMs: Milliseconds): Deadline
}

export type Clock = TimeSource & DeadlineSource
