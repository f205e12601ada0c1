/**
 * Sinks Module - Public API
 */

// Types
export type {
  LogRow,
  MessageSinkOptions,
  PostedMessage,
  Sink,
  SinkName,
  SinkReceipt,
  SlackConfig,
  SlackPostMessageRequest,
} from "./schema.js";

export { LOG_OUTCOME_OK } from "./schema.js";

// Error types
export type { SinkError } from "./errors.js";

export {
  formatSinkError,
  isRetryableSinkError,
  networkError,
  notConfigured,
  sendFailed,
  timeout,
} from "./errors.js";

// Service
export { createLogSink, createMessageSink } from "./service.js";

// Pure transformations
export {
  buildLogRow,
  buildSlackRequest,
  isRetryableSlackError,
  sheetsToSinkError,
} from "./transform.js";
