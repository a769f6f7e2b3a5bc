import { describeLoggerContract } from "../../../ports/__tests__/logger.contract"
import { capturingPinoLogger } from "./pino-harness"

describeLoggerContract("PinoLogger", capturingPinoLogger)
