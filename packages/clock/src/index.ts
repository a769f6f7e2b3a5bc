export { FakeClock } from "./adapters/fake-clock"
export { SystemClock } from "./adapters/system-clock"
export { isTimeoutReason, timeoutReason } from "./core/timeout-reason"
export { MAX_DEADLINE_MS } from "./ports/clock"
export type { Clock, Deadline, DeadlineSource, TimeSource } from "./ports/clock"
export type { Milliseconds, Seconds } from "./ports/time"
