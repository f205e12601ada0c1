/**
 * Device Module - Public API
 */

// Types
export type { ButtonPress, PressMessage, StatusPayload } from "./schema.js";

export { PressMessageSchema } from "./schema.js";

// Service functions
export type { DeviceEventHandlers } from "./service.js";

export {
  disconnectDeviceClient,
  initializeDeviceClient,
  isConnected,
  mqttDisplay,
} from "./service.js";

// Pure transformations
export {
  buildStatusPayload,
  buildStatusTopic,
  parsePress,
  parsePressTime,
  parsePressTopic,
} from "./transform.js";
