/**
 * Pipeline Module - Error Types
 *
 * Everything that can stop a press before it reaches the transport.
 */
import type { BuildError } from "../events/index.js";
import { formatBuildError } from "../events/index.js";
import type { TransportError } from "../transport/index.js";
import { formatTransportError } from "../transport/index.js";

export type PressError =
  | BuildError
  | TransportError
  | {
      readonly type: "RATE_LIMITED";
      readonly deviceId: string;
      readonly buttonIndex: number;
      readonly remainingMs: number;
    };

export function rateLimited(
  deviceId: string,
  buttonIndex: number,
  remainingMs: number,
): PressError {
  return { type: "RATE_LIMITED", deviceId, buttonIndex, remainingMs };
}

export function formatPressError(error: PressError): string {
  switch (error.type) {
    case "RATE_LIMITED":
      return `Button ${error.buttonIndex} on device ${error.deviceId} is rate limited for ${Math.ceil(error.remainingMs / 1000)}s`;
    case "SUBMISSION_FAILED":
      return formatTransportError(error);
    default:
      return formatBuildError(error);
  }
}
