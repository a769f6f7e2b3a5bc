import { MAX_DEADLINE_MS, type Seconds } from "@stowage/clock"
import { type LogLevelName, logLevelNames } from "@stowage/logger"
import type { MediaType } from "@stowage/media"
import { z } from "zod/mini"
import type { OperationTimeouts } from "../core/timeouts"

export const storageDrivers = ["s3", "memory"] as const
export type StorageDriver = (typeof storageDrivers)[number]

const integer = z.refine<number>((n: number) => Number.isInteger(n), { error: "Expected an integer" })

const timeoutMs = (fallback: number) =>
  z._default(z.coerce.number().check(z.positive(), z.lte(MAX_DEADLINE_MS)), fallback)

export const envSchema = z.object({
  APP_ENV: z._default(z.string(), "development"),
  SERVICE_NAME: z._default(z.string(), "stowage"),

  LOG_LEVEL: z._default(z.enum(logLevelNames), "info"),
  LOG_PRETTY: z._default(z.stringbool(), false),

  STORAGE_DRIVER: z._default(z.enum(storageDrivers), "s3"),

  S3_REGION: z._default(z.string(), "us-east-1"),
  S3_ENDPOINT: z.optional(z.string()),
  S3_FORCE_PATH_STYLE: z._default(z.stringbool(), false),
  S3_KEY_PREFIX: z._default(z.string(), ""),
  S3_PUBLIC_BASE_URL: z.optional(z.string()),

  UPLOAD_TIMEOUT_MS: timeoutMs(60_000),
  DELETE_TIMEOUT_MS: timeoutMs(5_000),
  REQUEST_TIMEOUT_MS: timeoutMs(30_000),
  BULK_TIMEOUT_MS: timeoutMs(300_000),

  PRESIGN_EXPIRY_SECONDS: z._default(
    z.coerce.number().check(integer, z.gte(1), z.lte(604_800)),
    900,
  ),
  ALLOWED_MEDIA_TYPES: z._default(
    z.string(),
    "image/jpeg,image/png,image/webp,application/pdf",
  ),
  LIST_PAGE_SIZE: z._default(z.coerce.number().check(integer, z.gte(1), z.lte(1000)), 100),
})

export type EnvConfig = z.infer<typeof envSchema>

export type GatewayConfig = {
  app: {
    env: string
    serviceName: string
  }

  logging: {
    level: LogLevelName
    prettify: boolean
  }

  storage: {
    driver: StorageDriver
  }

  s3: {
    region: string
    endpoint?: string
    forcePathStyle: boolean
    keyPrefix: string
    publicBaseUrl?: string
  }

  timeouts: OperationTimeouts

  uploads: {
    presignExpirySeconds: Seconds
    allowedMediaTypes: MediaType[]
  }

  listing: {
    pageSize: number
  }
}
