import type { StoragePort } from "../ports/storage"
import type { StorageBucket, StorageObjectMetadata } from "../ports/storage-object"
import type { ListOptions } from "../ports/storage-options"
import type { ListResult } from "../ports/storage-result"

type Lister = Pick<StoragePort, "list">

/**
 * Empty and absent cursors both mean "no cursor". Backends must never see
 * an empty continuation token.
 */
export function normalizeCursor(cursor: string | null | undefined): string | undefined {
  return cursor ? cursor : undefined
}

/**
 * Yields pages from `options.cursor` (or the start) until the backend stops
 * returning a cursor. Pages and objects keep backend order.
 */
export async function* paginate(
  storage: Lister,
  bucket: StorageBucket,
  options: ListOptions = {},
): AsyncGenerator<ListResult, void, undefined> {
  let cursor = normalizeCursor(options.cursor)

  do {
    const page = await storage.list(bucket, { ...options, cursor })

    yield page

    cursor = normalizeCursor(page.cursor)
  } while (cursor !== undefined)
}

/** Every object in `bucket` (under `options.prefix`), page by page. */
export async function* walkObjects(
  storage: Lister,
  bucket: StorageBucket,
  options: ListOptions = {},
): AsyncGenerator<StorageObjectMetadata, void, undefined> {
  for await (const page of paginate(storage, bucket, options)) {
    yield* page.objects
  }
}
