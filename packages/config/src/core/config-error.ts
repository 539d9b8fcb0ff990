import { BaseError } from "@murmur/errors"

export type ConfigErrorCode = "invalid_config" | "unresolved_reference"

export class ConfigError extends BaseError<ConfigErrorCode> {
  static invalid(details: string, keys: string[]): ConfigError {
    return new ConfigError(`Configuration validation failed:\n${details}`, {
      code: "invalid_config",
      context: { keys },
      isOperational: false,
    })
  }

  static unresolvedReference(key: string, reference: string): ConfigError {
    return new ConfigError(`${key} references \${${reference}}, which no source provides`, {
      code: "unresolved_reference",
      context: { key, reference },
      isOperational: false,
    })
  }
}
