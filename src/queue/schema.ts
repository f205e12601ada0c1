/**
 * Queue Module - Types
 *
 * Enqueue / receive-with-visibility-timeout / acknowledge semantics.
 * A received message that is neither acked nor released becomes visible
 * again once its visibility timeout passes (at-least-once).
 */

export type QueueMessage = Readonly<{
  messageId: string;
  /** Handle for this receipt only; a redelivery issues a new one */
  receiptHandle: string;
  body: string;
  /** Times this message has been received, including this one */
  receiveCount: number;
  enqueuedAt: number;
}>;

export type QueueStats = Readonly<{
  visible: number;
  inFlight: number;
  delayed: number;
}>;

export type InMemoryQueueOptions = Readonly<{
  visibilityTimeoutMs: number;
  maxMessages?: number;
  now?: () => number;
}>;
