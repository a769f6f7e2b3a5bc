/**
 * Contract for validating and parsing branded IDs at runtime boundaries.
 *
 * IdType defines how to recognize and parse a specific ID type when data
 * crosses boundaries (listing results, presign requests, caller input).
 *
 * @example
 * ```typescript
 * type UploadId = Brand<string, "UploadId">
 *
 * const isUploadId = (v: unknown): v is UploadId =>
 *   typeof v === "string" && v.startsWith("upl_")
 *
 * const UploadId: IdType<UploadId> = {
 *   kind: "UploadId",
 *   is: isUploadId,
 *   parse: (v) => {
 *     if (!isUploadId(v)) throw new TypeError("Invalid UploadId")
 *     return v
 *   },
 * }
 * ```
 */
export interface IdType<T> {
  /** Identifier name for error messages and debugging */
  readonly kind: string

  /**
   * Parse and validate unknown input, returning a branded ID.
   * @throws Implementation-defined error if validation fails
   */
  parse(value: unknown): T

  /** Type guard for non-throwing validation */
  is(value: unknown): value is T
}
