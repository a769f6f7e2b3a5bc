import { FakeClock } from "@stowage/clock"
import type { Logger } from "@stowage/logger"
import { MemoryStorage, type StoragePort } from "@stowage/storage"
import { beforeEach, describe, expect, it, vi } from "vitest"
import { mock } from "vitest-mock-extended"
import { DEFAULT_OPERATION_TIMEOUTS } from "../../core/timeouts"
import type { Mock } from "../../tests/mock"
import { BucketManager } from "../bucket-manager"

describe("BucketManager", () => {
  const start = Date.parse("2024-05-01T00:00:00.000Z")

  let clock: FakeClock
  let logger: Mock<Logger>
  let storage: MemoryStorage
  let manager: BucketManager

  beforeEach(() => {
    clock = new FakeClock(start)
    logger = mock<Logger>()
    storage = new MemoryStorage({ clock })
    manager = new BucketManager({ storage, logger, clock, timeouts: DEFAULT_OPERATION_TIMEOUTS })
  })

  const seed = async (bucket: string, count: number) => {
    for (let i = 0; i < count; i++) {
      await storage.put({ bucket, key: `file-${i}.bin` }, new Uint8Array(10))
    }
  }

  describe("createBucket", () => {
    it("creates a bucket and logs it", async () => {
      await manager.createBucket("photos")

      expect(await manager.bucketExists("photos")).toBe(true)
      expect(logger.info).toHaveBeenCalledWith("Bucket created", {
        operation: "createBucket",
        bucket: "photos",
      })
    })

    it("fails with bucket_already_exists without calling create", async () => {
      await manager.createBucket("photos")
      const create = vi.spyOn(storage, "createBucket")

      await expect(manager.createBucket("photos")).rejects.toMatchObject({
        code: "bucket_already_exists",
        context: { operation: "createBucket", bucket: "photos" },
      })
      expect(create).not.toHaveBeenCalled()
      expect(logger.error).toHaveBeenCalledWith(
        "Bucket operation failed",
        expect.objectContaining({ operation: "createBucket", bucket: "photos" }),
      )
    })

    it("rejects an invalid name before touching storage", async () => {
      const exists = vi.spyOn(storage, "bucketExists")

      await expect(manager.createBucket("Photos")).rejects.toMatchObject({
        code: "invalid_bucket_name",
        context: { rule: "charset" },
      })
      expect(exists).not.toHaveBeenCalled()
    })
  })

  describe("deleteBucket", () => {
    it("deletes an empty bucket", async () => {
      await manager.createBucket("photos")

      await manager.deleteBucket("photos")

      expect(await manager.bucketExists("photos")).toBe(false)
    })

    it("does not empty a bucket first", async () => {
      await manager.createBucket("photos")
      await seed("photos", 2)

      await expect(manager.deleteBucket("photos")).rejects.toMatchObject({
        code: "bucket_not_empty",
      })
      expect((await manager.bucketStats("photos")).objectCount).toBe(2)
    })

    it("fails with bucket_not_found for a missing bucket", async () => {
      await expect(manager.deleteBucket("photos")).rejects.toMatchObject({
        code: "bucket_not_found",
      })
    })
  })

  describe("emptyBucket", () => {
    it("deletes every object across pages and returns the count", async () => {
      await manager.createBucket("photos")
      await seed("photos", 25)

      expect(await manager.emptyBucket("photos")).toBe(25)
      expect(await manager.bucketStats("photos")).toEqual({
        bucket: "photos",
        objectCount: 0,
        totalSizeInBytes: 0,
      })
      expect(logger.info).toHaveBeenCalledWith("Bucket emptied", {
        operation: "emptyBucket",
        bucket: "photos",
        deleted: 25,
      })
    })

    it("is a no-op on an empty bucket", async () => {
      await manager.createBucket("photos")

      expect(await manager.emptyBucket("photos")).toBe(0)
    })
  })

  describe("bucketStats", () => {
    it("counts objects and sums their sizes", async () => {
      await manager.createBucket("photos")
      await seed("photos", 3)

      expect(await manager.bucketStats("photos")).toEqual({
        bucket: "photos",
        objectCount: 3,
        totalSizeInBytes: 30,
      })
    })
  })

  describe("listBuckets", () => {
    it("lists buckets by name with their creation time", async () => {
      await manager.createBucket("videos")
      clock.advance(1000)
      await manager.createBucket("photos")

      expect(await manager.listBuckets()).toEqual([
        { name: "photos", createdAt: new Date(start + 1000) },
        { name: "videos", createdAt: new Date(start) },
      ])
    })

    it("logs a thrown string as an application error", async () => {
      vi.spyOn(storage, "listBuckets").mockRejectedValueOnce("connection reset")

      await expect(manager.listBuckets()).rejects.toBe("connection reset")

      expect(logger.error).toHaveBeenCalledWith("Bucket operation failed", {
        operation: "listBuckets",
        err: expect.objectContaining({
          code: "unknown",
          message: "connection reset",
          isOperational: false,
          context: { operation: "listBuckets" },
        }),
      })
    })
  })

  describe("deadlines", () => {
    it("times out a bucket call that never answers", async () => {
      const stalled = mock<StoragePort>()
      stalled.bucketExists.mockReturnValue(new Promise<never>(() => {}))
      const slow = new BucketManager({
        storage: stalled,
        logger,
        clock,
        timeouts: DEFAULT_OPERATION_TIMEOUTS,
      })

      const pending = slow.bucketExists("photos")
      clock.advance(30_000)

      await expect(pending).rejects.toMatchObject({
        code: "operation_timeout",
        context: { operation: "bucketExists", bucket: "photos", timeoutMs: 30_000 },
      })
    })

    it("uses the bulk timeout for emptyBucket", async () => {
      const stalled = mock<StoragePort>()
      stalled.list.mockReturnValue(new Promise<never>(() => {}))
      const slow = new BucketManager({
        storage: stalled,
        logger,
        clock,
        timeouts: DEFAULT_OPERATION_TIMEOUTS,
      })

      const pending = slow.emptyBucket("photos")
      clock.advance(30_000)
      expect(clock.pendingDeadlines()).toBe(1)

      clock.advance(270_000)

      await expect(pending).rejects.toMatchObject({ code: "operation_timeout" })
    })
  })
})
