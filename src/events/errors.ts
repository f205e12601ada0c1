/**
 * Events Module - Error Types
 *
 * Build failures keep the resolver's error kinds unchanged.
 */
import type { ConfigError } from "../button-config/index.js";
import { formatConfigError } from "../button-config/index.js";

export type BuildError =
  | ConfigError
  | {
      readonly type: "BUTTON_DISABLED";
      readonly deviceId: string;
      readonly buttonIndex: number;
    }
  | {
      readonly type: "INVALID_CAPTURE_TIME";
      readonly deviceId: string;
      readonly buttonIndex: number;
      readonly capturedAt: number;
    };

export function buttonDisabled(deviceId: string, buttonIndex: number): BuildError {
  return { type: "BUTTON_DISABLED", deviceId, buttonIndex };
}

export function invalidCaptureTime(
  deviceId: string,
  buttonIndex: number,
  capturedAt: number,
): BuildError {
  return { type: "INVALID_CAPTURE_TIME", deviceId, buttonIndex, capturedAt };
}

export function formatBuildError(error: BuildError): string {
  switch (error.type) {
    case "BUTTON_DISABLED":
      return `Button ${error.buttonIndex} on device ${error.deviceId} is disabled`;
    case "INVALID_CAPTURE_TIME":
      return `Capture time ${error.capturedAt} of button ${error.buttonIndex} on device ${error.deviceId} is not a valid timestamp`;
    default:
      return formatConfigError(error);
  }
}
