/** Produces a fresh identifier on every call. */
export interface IdGenerator<T> {
  generate(): T
}
