export {
  createFileGateway,
  type FileGateway,
  type FileGatewayOverrides,
  loadFileGateway,
} from "./composition/create-file-gateway"
export {
  type EnvConfig,
  envSchema,
  type GatewayConfig,
  type LoadGatewayConfigOptions,
  loadGatewayConfig,
  mapEnvToConfig,
  type StorageDriver,
} from "./config"
export { type DeadlineOptions, withDeadline } from "./core/deadline"
export { allOrNothing } from "./core/fan-out"
export { DEFAULT_OPERATION_TIMEOUTS, type OperationTimeouts } from "./core/timeouts"
export {
  assertValidObjectKey,
  MAX_OBJECT_KEY_BYTES,
  validateObjectKey,
} from "./core/validation/object-key"
export { formatBytes } from "./lib/format-bytes"
export { GatewayError, type GatewayErrorCode } from "./model/gateway.errors"
export type {
  ListQuery,
  ObjectSummary,
  PaginatedListing,
  PresignedUrl,
  StoredFile,
} from "./model/stored-file"
export {
  BufferBody,
  closeBody,
  FileBody,
  isSeekableBody,
  type SeekableBody,
  type UploadBody,
} from "./model/upload-body"
export { UploadRequest } from "./model/upload-request"
export { BucketManager, type BucketManagerDeps } from "./services/bucket-manager"
export { FileOrchestrator, type FileOrchestratorDeps } from "./services/file-orchestrator"
