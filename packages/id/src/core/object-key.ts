import { uuidV7 } from "../adapters/uuid"
import type { IdGenerator } from "../ports/id-generator"
import type { Brand } from "./brand"
import { type IdCodec, withGenerator } from "./id-codec"
import type { IdType } from "./id-type"

/** `<uuidv7>` optionally followed by `.<ext>`, extension lower-case. */
export type ObjectKey = Brand<string, "ObjectKey">

const OBJECT_KEY_PATTERN =
  /^[0-9a-f]{8}-[0-9a-f]{4}-7[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}(\.[a-z0-9]{1,16})?$/

const EXTENSION_PATTERN = /^[a-z0-9]{1,16}$/

const isObjectKey = (v: unknown): v is ObjectKey =>
  typeof v === "string" && OBJECT_KEY_PATTERN.test(v)

export const ObjectKey: IdType<ObjectKey> = {
  kind: "ObjectKey",
  is: isObjectKey,
  parse: (v) => {
    if (!isObjectKey(v)) throw new TypeError("Invalid ObjectKey")
    return v
  },
}

/**
 * Lower-cased extension of an untrusted file name, without the dot, or `""`
 * when there is none or it is not `[a-z0-9]{1,16}`. Directory parts and
 * leading-dot names (".env") carry no extension.
 */
export function extensionOf(originalName: string): string {
  const base = originalName.slice(Math.max(originalName.lastIndexOf("/"), originalName.lastIndexOf("\\")) + 1)
  const dot = base.lastIndexOf(".")

  if (dot <= 0) return ""

  const ext = base.slice(dot + 1).toLowerCase()

  return EXTENSION_PATTERN.test(ext) ? ext : ""
}

export type ObjectKeyFactory = IdCodec<ObjectKey> & {
  /** New key for an upload; only the extension of `originalName` survives. */
  forFile(originalName: string): ObjectKey
}

export function createObjectKeyFactory(generator: IdGenerator<string> = uuidV7): ObjectKeyFactory {
  const codec = withGenerator(ObjectKey, generator)

  return {
    ...codec,
    forFile: (originalName) => {
      const ext = extensionOf(originalName)

      return ObjectKey.parse(ext ? `${generator.generate()}.${ext}` : generator.generate())
    },
  }
}
