/**
 * Status Module - Types
 *
 * Status sent back to the device. `stage` separates a press rejected
 * on the spot ("press") from one accepted and failed later ("delivery").
 */
import type { Result } from "neverthrow";

export type DeviceStatus = "ok" | "error";

export type StatusStage = "press" | "delivery";

export type StatusUpdate = Readonly<{
  deviceId: string;
  buttonIndex: number;
  status: DeviceStatus;
  stage: StatusStage;
  eventId: string | null;
  reason: string | null;
}>;

export type DisplayError = Readonly<{
  message: string;
}>;

/**
 * The device's display capability.
 */
export type DeviceDisplay = Readonly<{
  showStatus: (update: StatusUpdate) => Promise<Result<void, DisplayError>>;
}>;
