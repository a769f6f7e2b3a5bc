import { SystemClock } from "@stowage/clock"
import { describeStorageContractTests } from "../../../ports/__tests__/storage.contract"
import { MemoryStorage } from "../../memory-storage"

describeStorageContractTests(
  "Memory",
  async () => {
    const bucket = "test-bucket"
    const storage = new MemoryStorage({ clock: new SystemClock() }, { buckets: [bucket] })

    return { bucket, storage }
  },
  { echoesPresignExpiry: true },
)
