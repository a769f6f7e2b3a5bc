import { type Clock, SystemClock } from "@stowage/clock"
import { createObjectKeyFactory, type ObjectKeyFactory } from "@stowage/id"
import { createPinoLogger, type Logger } from "@stowage/logger"
import { MediaTypePolicy } from "@stowage/media"
import {
  createMemoryStorage,
  createS3Storage,
  S3Client,
  type StoragePort,
} from "@stowage/storage"
import { type LoadGatewayConfigOptions, loadGatewayConfig } from "../config/load-gateway-config"
import type { GatewayConfig } from "../config/schema"
import { BucketManager } from "../services/bucket-manager"
import { FileOrchestrator } from "../services/file-orchestrator"

export type FileGatewayOverrides = {
  clock?: Clock
  logger?: Logger
  storage?: StoragePort
  s3Client?: S3Client
  keys?: ObjectKeyFactory
}

export type FileGateway = {
  config: GatewayConfig
  clock: Clock
  logger: Logger
  storage: StoragePort
  files: FileOrchestrator
  buckets: BucketManager
}

/** Wires clock, logger, storage, orchestrator and bucket manager from config. */
export function createFileGateway(
  config: GatewayConfig,
  overrides: FileGatewayOverrides = {},
): FileGateway {
  const clock = overrides.clock ?? new SystemClock()

  const logger =
    overrides.logger ??
    createPinoLogger(
      { level: config.logging.level, prettify: config.logging.prettify },
      { service: config.app.serviceName, env: config.app.env },
    )

  const storage = overrides.storage ?? createStorage(config, clock, overrides.s3Client)

  const files = new FileOrchestrator({
    storage,
    clock,
    logger: logger.child({ module: "files" }),
    keys: overrides.keys ?? createObjectKeyFactory(),
    mediaPolicy: new MediaTypePolicy(config.uploads.allowedMediaTypes),
    timeouts: config.timeouts,
    presignExpirySeconds: config.uploads.presignExpirySeconds,
    listPageSize: config.listing.pageSize,
  })

  const buckets = new BucketManager({
    storage,
    clock,
    logger: logger.child({ module: "buckets" }),
    timeouts: config.timeouts,
  })

  return { config, clock, logger, storage, files, buckets }
}

/** Loads config (dotenv, environment, overrides) and composes the gateway. */
export async function loadFileGateway(
  options: LoadGatewayConfigOptions = {},
  overrides: FileGatewayOverrides = {},
): Promise<FileGateway> {
  const config = await loadGatewayConfig(options)

  return createFileGateway(config, overrides)
}

function createStorage(config: GatewayConfig, clock: Clock, s3Client?: S3Client): StoragePort {
  if (config.storage.driver === "memory") {
    return createMemoryStorage({ clock })
  }

  const client =
    s3Client ??
    new S3Client({
      region: config.s3.region,
      forcePathStyle: config.s3.forcePathStyle,
      ...(config.s3.endpoint && { endpoint: config.s3.endpoint }),
    })

  return createS3Storage({
    client,
    clock,
    keyspacePrefix: config.s3.keyPrefix,
    region: config.s3.region,
    ...(config.s3.publicBaseUrl && { publicBaseUrl: config.s3.publicBaseUrl }),
  })
}
