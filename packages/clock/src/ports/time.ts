/** Milliseconds since Unix epoch, or a duration in milliseconds. */
export type Milliseconds = number

/** A duration in whole seconds. */
export type Seconds = number
