import { BaseError } from "@stowage/errors"

import { createPinoLogger, PinoLogger } from "../pino-logger"
import { captureDestination } from "./pino-harness"

describe("PinoLogger behavior", () => {
  it("emits JSON to the provided destination with bindings", () => {
    const { captured, destination } = captureDestination()

    const logger = new PinoLogger(
      { destination },
      { level: "trace", prettify: false },
      { service: "stowage" },
    )

    logger.info("hello", { bucket: "media" })

    expect(captured).toHaveLength(1)

    const payload = captured[0]?.payload

    expect(payload).toMatchObject({
      msg: "hello",
      service: "stowage",
      bucket: "media",
      level: 30,
    })
    expect(typeof payload?.time).toBe("number")
  })

  it("child() inherits the base logger sink and level", () => {
    const { captured, destination } = captureDestination()

    const base = new PinoLogger({ destination }, { level: "warn" }, { service: "stowage" })
    const child = base.child({ operation: "delete" })

    child.info("ignored")
    child.warn("logged")

    expect(captured).toHaveLength(1)
    expect(captured[0]?.payload).toMatchObject({
      msg: "logged",
      service: "stowage",
      operation: "delete",
    })
  })

  it("serializes err with its cause chain", () => {
    const { captured, destination } = captureDestination()
    const logger = new PinoLogger({ destination }, { level: "info" })

    const err = new BaseError("Backend unavailable", {
      code: "backend_unavailable",
      cause: new Error("ECONNRESET"),
    })

    logger.error("put failed", { err })

    const logged = captured[0]?.payload.err

    expect(logged).toMatchObject({
      type: "BaseError",
      message: "Backend unavailable",
      code: "backend_unavailable",
      cause: { message: "ECONNRESET" },
    })
  })

  it("prettify is ignored when an explicit destination is given", () => {
    const { captured, destination } = captureDestination()

    const logger = createPinoLogger({ level: "info", prettify: true }, {}, { destination })
    logger.info("plain json")

    expect(captured[0]?.payload.msg).toBe("plain json")
  })
})
