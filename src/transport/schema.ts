/**
 * Transport Module - Types
 *
 * Local submission, remote delivery verdicts and dead-letter records.
 */
import type { ButtonEvent } from "../events/index.js";

/**
 * Returned to the device side as soon as the event is enqueued.
 */
export type SubmissionReceipt = Readonly<{
  eventId: string;
  messageId: string;
  submittedAt: number;
}>;

/**
 * What the remote handler decided for one delivery.
 */
export type DeliveryVerdict = Readonly<{
  acknowledge: boolean;
  reason: string | null;
}>;

export type EventHandler = (event: ButtonEvent) => Promise<DeliveryVerdict>;

/**
 * Terminal record of an event whose delivery permanently failed.
 * `event` is null when the queue body could not be parsed.
 */
export type DeadLetterRecord = Readonly<{
  key: string;
  event: ButtonEvent | null;
  body: string;
  attempts: number;
  reason: string;
  deadLetteredAt: number;
}>;

export type TransportOptions = Readonly<{
  maxAttempts: number;
  backoffMs: number;
  maxBackoffMs: number;
  pollIntervalMs: number;
  batchSize: number;
}>;
