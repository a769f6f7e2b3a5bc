import type { UploadBody } from "./upload-body"
import type { StoredFile } from "./stored-file"

/**
 * One file to upload. The orchestrator owns `body` from the moment the
 * request is submitted and closes it whatever the outcome.
 */
export class UploadRequest {
  private stored: StoredFile | undefined

  constructor(
    /** Untrusted client file name; only its extension is kept. */
    readonly originalName: string,
    readonly body: UploadBody,
  ) {}

  /** Set once the upload has succeeded. */
  get result(): StoredFile | undefined {
    return this.stored
  }

  complete(file: StoredFile): void {
    this.stored = file
  }
}
