import { BaseError } from "../errors"

export type ConfigIssue = { path: string; message: string }

export class ConfigError extends BaseError<"invalid_config"> {
  static invalid(summary: string, issues: ConfigIssue[]): ConfigError {
    return new ConfigError(`Configuration validation failed:\n${summary}`, {
      code: "invalid_config",
      context: { issues },
      isOperational: false,
    })
  }
}
