import { type FileHandle, open } from "node:fs/promises"
import { Readable } from "node:stream"
import type { Bytes } from "@stowage/storage"

/**
 * A body that can be read from the start, rewound and read again. Content
 * sniffing reads the first bytes and then hands the whole body on, so a
 * plain one-shot Readable is not enough.
 */
export interface SeekableBody {
  readonly sizeInBytes: Bytes
  readonly closed: boolean

  /** Up to `length` bytes from the current position; advances the position. */
  read(length: number): Promise<Uint8Array>

  /** Back to offset zero. */
  rewind(): Promise<void>

  /**
   * The rest of the body from the current position. Destroying the stream
   * does not close the body.
   */
  stream(): Readable

  close(): Promise<void>
}

export type UploadBody = SeekableBody | Readable

export function isSeekableBody(body: UploadBody): body is SeekableBody {
  return !(body instanceof Readable)
}

export async function closeBody(body: UploadBody): Promise<void> {
  if (body instanceof Readable) {
    body.destroy()
    return
  }

  await body.close()
}

export class BufferBody implements SeekableBody {
  private position = 0
  private isClosed = false

  constructor(private readonly data: Uint8Array) {}

  get sizeInBytes(): Bytes {
    return this.data.byteLength
  }

  get closed(): boolean {
    return this.isClosed
  }

  async read(length: number): Promise<Uint8Array> {
    this.assertOpen()

    const chunk = this.data.subarray(this.position, this.position + length)
    this.position += chunk.byteLength

    return chunk
  }

  async rewind(): Promise<void> {
    this.assertOpen()
    this.position = 0
  }

  stream(): Readable {
    this.assertOpen()

    return Readable.from(Buffer.from(this.data.subarray(this.position)))
  }

  async close(): Promise<void> {
    this.isClosed = true
  }

  private assertOpen(): void {
    if (this.isClosed) throw new TypeError("Upload body is closed")
  }
}

/** A file on local disk, read through one handle that close() releases. */
export class FileBody implements SeekableBody {
  private position = 0
  private isClosed = false

  private constructor(
    private readonly handle: FileHandle,
    readonly sizeInBytes: Bytes,
  ) {}

  static async open(path: string): Promise<FileBody> {
    const handle = await open(path, "r")

    try {
      const stats = await handle.stat()

      return new FileBody(handle, stats.size)
    } catch (err) {
      await handle.close()
      throw err
    }
  }

  get closed(): boolean {
    return this.isClosed
  }

  async read(length: number): Promise<Uint8Array> {
    this.assertOpen()

    const buffer = Buffer.alloc(length)
    const { bytesRead } = await this.handle.read(buffer, 0, length, this.position)
    this.position += bytesRead

    return buffer.subarray(0, bytesRead)
  }

  async rewind(): Promise<void> {
    this.assertOpen()
    this.position = 0
  }

  stream(): Readable {
    this.assertOpen()

    return this.handle.createReadStream({ start: this.position, autoClose: false })
  }

  async close(): Promise<void> {
    if (this.isClosed) return

    this.isClosed = true
    await this.handle.close()
  }

  private assertOpen(): void {
    if (this.isClosed) throw new TypeError("Upload body is closed")
  }
}
