import { BaseError } from "@reprkit/errors"

export class ConfigError extends BaseError<"config_invalid"> {
  static invalid(details: string, sources: readonly string[]): ConfigError {
    return new ConfigError(`Configuration validation failed:\n${details}`, {
      code: "config_invalid",
      context: { sources: [...sources] },
    })
  }
}
