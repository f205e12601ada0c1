/**
 * Transport Module - Public API
 */

// Types
export type {
  DeadLetterRecord,
  DeliveryVerdict,
  EventHandler,
  SubmissionReceipt,
  TransportOptions,
} from "./schema.js";

// Error types
export type { TransportError } from "./errors.js";

export {
  formatTransportError,
  submissionFailed,
} from "./errors.js";

// Dead letters
export type { DeadLetterStore } from "./dead-letters.js";

export { createDeadLetterStore } from "./dead-letters.js";

// Service
export type { Transport, TransportDependencies } from "./service.js";

export { createTransport } from "./service.js";

// Pure transformations
export {
  createDeadLetterRecord,
  isFinalAttempt,
  redeliveryDelayMs,
} from "./transform.js";
