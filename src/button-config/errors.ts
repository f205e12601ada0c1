/**
 * Button Config Module - Error Types
 *
 * Typed error union for config resolution.
 */

export type ConfigError =
  | {
      readonly type: "CONFIG_NOT_FOUND";
      readonly deviceId: string;
      readonly buttonIndex: number;
    }
  | {
      readonly type: "CONFIG_SOURCE_UNAVAILABLE";
      readonly message: string;
    };

/**
 * Failure reported by a config source.
 */
export type ConfigSourceError = Readonly<{
  message: string;
}>;

export function configNotFound(
  deviceId: string,
  buttonIndex: number,
): ConfigError {
  return { type: "CONFIG_NOT_FOUND", deviceId, buttonIndex };
}

export function sourceUnavailable(message: string): ConfigError {
  return { type: "CONFIG_SOURCE_UNAVAILABLE", message };
}

export function formatConfigError(error: ConfigError): string {
  switch (error.type) {
    case "CONFIG_NOT_FOUND":
      return `No config row for device ${error.deviceId} button ${error.buttonIndex}`;
    case "CONFIG_SOURCE_UNAVAILABLE":
      return `Config source unavailable: ${error.message}`;
  }
}
