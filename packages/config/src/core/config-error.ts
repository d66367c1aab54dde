import { BaseError } from "@nimbus/errors"

export type ConfigErrorCode = "config_invalid" | "config_unreadable"

export type ConfigIssue = {
  path: string
  message: string
}

export class ConfigError extends BaseError<ConfigErrorCode> {
  static invalid(report: string, issues: ConfigIssue[]): ConfigError {
    return new ConfigError(`Configuration validation failed:\n${report}`, {
      code: "config_invalid",
      context: { issues },
      isRetryable: false,
    })
  }

  static unreadable(source: string, cause: unknown): ConfigError {
    return new ConfigError(`Configuration source ${source} could not be loaded`, {
      code: "config_unreadable",
      context: { source },
      cause,
      isRetryable: false,
    })
  }
}
