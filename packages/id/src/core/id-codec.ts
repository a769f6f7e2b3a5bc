import type { IdGenerator } from "../ports/id-generator"
import type { IdType } from "./id-type"

export type IdCodec<T> = IdType<T> & IdGenerator<T>

/** Pairs an id type with a raw generator. Every generated value goes through `type.parse`. */
export function withGenerator<T>(type: IdType<T>, generator: IdGenerator<unknown>): IdCodec<T> {
  return {
    kind: type.kind,
    is: type.is,
    parse: type.parse,
    generate: () => type.parse(generator.generate()),
  }
}
