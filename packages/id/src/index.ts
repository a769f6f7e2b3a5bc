export { uuidV7 } from "./adapters/uuid"
export type { Brand } from "./core/brand"
export { type IdCodec, withGenerator } from "./core/id-codec"
export type { IdType } from "./core/id-type"
export {
  createObjectKeyFactory,
  extensionOf,
  ObjectKey,
  type ObjectKeyFactory,
} from "./core/object-key"
export type { IdGenerator } from "./ports/id-generator"
