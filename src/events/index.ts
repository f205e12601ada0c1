/**
 * Events Module - Public API
 */

// Types
export type { ButtonEvent } from "./schema.js";

export {
  ButtonEventSchema,
  CaptureTimeSchema,
  DEFAULT_MESSAGE,
  MAX_CAPTURE_TIME_MS,
} from "./schema.js";

// Error types
export type { BuildError } from "./errors.js";

export { buttonDisabled, formatBuildError, invalidCaptureTime } from "./errors.js";

// Service
export type { EventBuilder, EventBuilderOptions } from "./service.js";

export { createEventBuilder } from "./service.js";

// Pure transformations
export {
  createButtonEvent,
  parseEvent,
  renderMessage,
  serializeEvent,
  withAttempt,
} from "./transform.js";
