/**
 * Queue Module - Public API
 */
export type { InMemoryQueueOptions, QueueMessage, QueueStats } from "./schema.js";

export type { QueueError } from "./errors.js";

export {
  formatQueueError,
  queueFull,
  receiptInvalid,
} from "./errors.js";

export type { MessageQueue } from "./service.js";

export { createInMemoryQueue } from "./service.js";
