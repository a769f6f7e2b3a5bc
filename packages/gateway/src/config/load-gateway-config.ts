import {
  type ConfigSource,
  DotenvSource,
  EnvSource,
  loadConfig,
  ObjectSource,
} from "@stowage/config"
import { type EnvConfig, envSchema, type GatewayConfig } from "./schema"

export function mapEnvToConfig(env: EnvConfig): GatewayConfig {
  return {
    app: {
      env: env.APP_ENV,
      serviceName: env.SERVICE_NAME,
    },
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
    },
    storage: {
      driver: env.STORAGE_DRIVER,
    },
    s3: {
      region: env.S3_REGION,
      forcePathStyle: env.S3_FORCE_PATH_STYLE,
      keyPrefix: env.S3_KEY_PREFIX,
      ...(env.S3_ENDPOINT !== undefined && { endpoint: env.S3_ENDPOINT }),
      ...(env.S3_PUBLIC_BASE_URL !== undefined && { publicBaseUrl: env.S3_PUBLIC_BASE_URL }),
    },
    timeouts: {
      uploadMs: env.UPLOAD_TIMEOUT_MS,
      deleteMs: env.DELETE_TIMEOUT_MS,
      requestMs: env.REQUEST_TIMEOUT_MS,
      bulkMs: env.BULK_TIMEOUT_MS,
    },
    uploads: {
      presignExpirySeconds: env.PRESIGN_EXPIRY_SECONDS,
      allowedMediaTypes: env.ALLOWED_MEDIA_TYPES.split(",")
        .map((type) => type.trim())
        .filter((type) => type.length > 0),
    },
    listing: {
      pageSize: env.LIST_PAGE_SIZE,
    },
  }
}

export type LoadGatewayConfigOptions = {
  env?: NodeJS.ProcessEnv
  /** Raw settings applied over every other source, e.g. `{ STORAGE_DRIVER: "memory" }` */
  overrides?: Record<string, unknown>
  /** Where `.env.<NODE_ENV>` is looked up */
  cwd?: string
}

/** `.env.<NODE_ENV>` (optional), then the environment, then overrides; `${VAR}` references expanded. */
export async function loadGatewayConfig(
  options: LoadGatewayConfigOptions = {},
): Promise<GatewayConfig> {
  const env = options.env ?? process.env

  const sources: ConfigSource[] = [
    new DotenvSource({
      file: `.env.${env.NODE_ENV ?? "development"}`,
      required: false,
      cwd: options.cwd ?? process.cwd(),
    }),
    new EnvSource({ env }),
    ...(options.overrides ? [new ObjectSource(options.overrides)] : []),
  ]

  const result = await loadConfig({
    schema: envSchema,
    sources,
    expandEnv: true,
  })

  return mapEnvToConfig(result.value)
}
