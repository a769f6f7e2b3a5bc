import { Config } from "../config"

describe("Config", () => {
  const data = { UPLOAD_TIMEOUT_MS: 60_000, LOG_PRETTY: false, S3_REGION: "eu-west-1" }
  const provenance = { UPLOAD_TIMEOUT_MS: "env", S3_REGION: "dotenv:.env" }
  const providedKeys = new Set(["UPLOAD_TIMEOUT_MS", "S3_REGION", "STALE_KEY"])

  const config = new Config(data, provenance, providedKeys)

  describe("get", () => {
    it("returns value by key", () => {
      expect(config.get("UPLOAD_TIMEOUT_MS")).toBe(60_000)
      expect(config.get("S3_REGION")).toBe("eu-west-1")
    })

    it("returns correct type for each key", () => {
      const timeout: number = config.get("UPLOAD_TIMEOUT_MS")
      const pretty: boolean = config.get("LOG_PRETTY")
      const region: string = config.get("S3_REGION")

      expect(typeof timeout).toBe("number")
      expect(typeof pretty).toBe("boolean")
      expect(typeof region).toBe("string")
    })
  })

  describe("keys", () => {
    it("returns all config keys", () => {
      const keys = config.keys()

      expect(keys).toContain("UPLOAD_TIMEOUT_MS")
      expect(keys).toContain("LOG_PRETTY")
      expect(keys).toContain("S3_REGION")
      expect(keys).toHaveLength(3)
    })

    it("does not include extra keys", () => {
      const keys = config.keys()

      expect(keys).not.toContain("STALE_KEY")
    })
  })

  describe("explain", () => {
    it("returns source name for key from source", () => {
      expect(config.explain("UPLOAD_TIMEOUT_MS")).toBe("env")
      expect(config.explain("S3_REGION")).toBe("dotenv:.env")
    })

    it("returns 'default' for key from schema default", () => {
      expect(config.explain("LOG_PRETTY")).toBe("default")
    })
  })

  describe("sourcesUsed", () => {
    it("returns source names", () => {
      const sources = config.sourcesUsed()

      expect(sources).toContain("env")
      expect(sources).toContain("dotenv:.env")
    })

    it("lists each source once", () => {
      expect(config.sourcesUsed()).toEqual(["env", "dotenv:.env"])
    })
  })

  describe("unknownKeys", () => {
    it("returns keys in sources but not in schema", () => {
      const extras = config.unknownKeys()

      expect(extras).toContain("STALE_KEY")
    })

    it("returns empty array when no extras", () => {
      const noExtrasConfig = new Config(
        data,
        provenance,
        new Set(["UPLOAD_TIMEOUT_MS", "S3_REGION", "LOG_PRETTY"]),
      )

      expect(noExtrasConfig.unknownKeys()).toEqual([])
    })
  })

  describe("immutability", () => {
    it("data is frozen", () => {
      expect(() => {
        ;(config as any).data.PORT = 9999
      }).toThrow()
    })
  })
})
