import { mkdtemp, rm } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { FakeClock } from "@stowage/clock"
import { type Logger, NullLogger } from "@stowage/logger"
import { MemoryStorage, S3Storage } from "@stowage/storage"
import { describe, expect, it } from "vitest"
import { mock } from "vitest-mock-extended"
import type { GatewayConfig } from "../../config/schema"
import { BufferBody } from "../../model/upload-body"
import { UploadRequest } from "../../model/upload-request"
import { createFileGateway, loadFileGateway } from "../create-file-gateway"

const PNG = Uint8Array.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a])

function configFor(overrides: Partial<GatewayConfig> = {}): GatewayConfig {
  return {
    app: { env: "test", serviceName: "stowage" },
    logging: { level: "info", prettify: false },
    storage: { driver: "memory" },
    s3: { region: "us-east-1", forcePathStyle: false, keyPrefix: "" },
    timeouts: { uploadMs: 60_000, deleteMs: 5_000, requestMs: 30_000, bulkMs: 300_000 },
    uploads: { presignExpirySeconds: 600, allowedMediaTypes: ["image/png"] },
    listing: { pageSize: 100 },
    ...overrides,
  }
}

describe("createFileGateway", () => {
  it("wires an in-memory gateway end to end", async () => {
    const clock = new FakeClock(Date.parse("2024-05-01T00:00:00.000Z"))
    const gateway = createFileGateway(configFor(), { clock, logger: new NullLogger() })

    expect(gateway.storage).toBeInstanceOf(MemoryStorage)

    await gateway.buckets.createBucket("media")
    const file = await gateway.files.uploadOne("media", new UploadRequest("a.png", new BufferBody(PNG)))
    const presigned = await gateway.files.presignedUrl("media", file.key)

    expect(await gateway.files.statObject("media", file.key)).toEqual(file)
    expect(presigned.url.searchParams.get("expiresIn")).toBe("600")
    expect(presigned.expiresAt).toEqual(new Date(Date.parse("2024-05-01T00:10:00.000Z")))
  })

  it("applies the configured media allow-list", async () => {
    const gateway = createFileGateway(
      configFor({ uploads: { presignExpirySeconds: 600, allowedMediaTypes: ["application/pdf"] } }),
      { clock: new FakeClock(), logger: new NullLogger() },
    )
    await gateway.buckets.createBucket("media")

    await expect(
      gateway.files.uploadOne("media", new UploadRequest("a.png", new BufferBody(PNG))),
    ).rejects.toMatchObject({ code: "unsupported_media_type" })
  })

  it("scopes the service loggers by module", () => {
    const logger = mock<Logger>()

    createFileGateway(configFor(), { clock: new FakeClock(), logger })

    expect(logger.child).toHaveBeenCalledWith({ module: "files" })
    expect(logger.child).toHaveBeenCalledWith({ module: "buckets" })
  })

  it("builds S3 storage with the keyspace prefix and public base URL", () => {
    const gateway = createFileGateway(
      configFor({
        storage: { driver: "s3" },
        s3: {
          region: "eu-west-1",
          forcePathStyle: true,
          keyPrefix: "tenant",
          publicBaseUrl: "https://cdn.example.test/",
        },
      }),
      { clock: new FakeClock(), logger: new NullLogger() },
    )

    expect(gateway.storage).toBeInstanceOf(S3Storage)
    expect(gateway.storage.locate({ bucket: "media", key: "a.png" }).href).toBe(
      "https://cdn.example.test/media/tenant/a.png",
    )
  })
})

describe("loadFileGateway", () => {
  it("loads config from the environment and composes the gateway", async () => {
    const cwd = await mkdtemp(join(tmpdir(), "stowage-gateway-"))

    try {
      const gateway = await loadFileGateway(
        { cwd, env: { STORAGE_DRIVER: "memory", PRESIGN_EXPIRY_SECONDS: "60" } },
        { logger: new NullLogger() },
      )

      expect(gateway.storage).toBeInstanceOf(MemoryStorage)
      expect(gateway.config.uploads.presignExpirySeconds).toBe(60)
    } finally {
      await rm(cwd, { recursive: true, force: true })
    }
  })
})
