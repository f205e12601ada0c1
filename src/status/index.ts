/**
 * Status Module - Public API
 */
export type {
  DeviceDisplay,
  DeviceStatus,
  DisplayError,
  StatusStage,
  StatusUpdate,
} from "./schema.js";

export type { StatusReporter } from "./service.js";

export { createStatusReporter } from "./service.js";

export { deadLetterStatus, deliveryStatus, rejectedStatus } from "./transform.js";
