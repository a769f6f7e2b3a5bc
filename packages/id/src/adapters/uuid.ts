import { v7 } from "uuid"
import type { IdGenerator } from "../ports/id-generator"

/**
 * Time-ordered UUIDs. Within one process, later calls always sort after
 * earlier ones, even inside the same millisecond.
 */
export const uuidV7: IdGenerator<string> = { generate: () => v7() }
