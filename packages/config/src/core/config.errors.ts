import { BaseError } from "@stowage/errors"

export type ConfigErrorCode = "invalid_config"

export class ConfigError extends BaseError<ConfigErrorCode> {
  static validationFailed(details: string, issueCount: number): ConfigError {
    return new ConfigError(`Configuration validation failed:\n${details}`, {
      code: "invalid_config",
      context: { issueCount },
    })
  }

  static missingFile(file: string, cause: unknown): ConfigError {
    return new ConfigError(`Required configuration file not found: ${file}`, {
      code: "invalid_config",
      context: { file },
      cause,
    })
  }

  static expansionCycle(chain: readonly string[]): ConfigError {
    return new ConfigError("Circular reference while expanding configuration", {
      code: "invalid_config",
      context: { chain: [...chain] },
    })
  }
}
