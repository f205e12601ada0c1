/**
 * Queue Module - Service Layer
 *
 * The queue capability used by the transport, and an in-process
 * implementation with visibility-timeout redelivery.
 */
import { randomUUID } from "node:crypto";
import { type Result, err, ok } from "neverthrow";

import { createLogger } from "../logger.js";
import type { QueueError } from "./errors.js";
import { queueFull, receiptInvalid } from "./errors.js";
import type { InMemoryQueueOptions, QueueMessage, QueueStats } from "./schema.js";

const log = createLogger("queue");

export type MessageQueue = Readonly<{
  enqueue: (body: string) => Promise<Result<string, QueueError>>;
  receive: (maxMessages: number) => Promise<Result<QueueMessage[], QueueError>>;
  ack: (receiptHandle: string) => Promise<Result<void, QueueError>>;
  /** Make a received message visible again after `delayMs` */
  release: (receiptHandle: string, delayMs: number) => Promise<Result<void, QueueError>>;
  stats: () => QueueStats;
}>;

type StoredMessage = {
  readonly messageId: string;
  readonly body: string;
  readonly enqueuedAt: number;
  receiveCount: number;
  visibleAt: number;
  receiptHandle: string | null;
};

export function createInMemoryQueue(options: InMemoryQueueOptions): MessageQueue {
  const now = options.now ?? Date.now;
  const capacity = options.maxMessages ?? Number.POSITIVE_INFINITY;

  // insertion order doubles as FIFO order
  const messages = new Map<string, StoredMessage>();
  const byReceipt = new Map<string, string>();

  const findByReceipt = (receiptHandle: string): StoredMessage | null => {
    const messageId = byReceipt.get(receiptHandle);
    if (messageId === undefined) return null;
    const stored = messages.get(messageId);
    if (!stored || stored.receiptHandle !== receiptHandle) return null;
    return stored;
  };

  const enqueue = async (body: string): Promise<Result<string, QueueError>> => {
    if (messages.size >= capacity) {
      log.warn({ capacity }, "Queue full - rejecting message");
      return err(queueFull(capacity));
    }

    const messageId = randomUUID();
    const at = now();
    messages.set(messageId, {
      messageId,
      body,
      enqueuedAt: at,
      receiveCount: 0,
      visibleAt: at,
      receiptHandle: null,
    });
    return ok(messageId);
  };

  const receive = async (
    maxMessages: number,
  ): Promise<Result<QueueMessage[], QueueError>> => {
    const at = now();
    const received: QueueMessage[] = [];

    for (const stored of messages.values()) {
      if (received.length >= maxMessages) break;
      if (stored.visibleAt > at) continue;

      // the previous receipt (if any) expired with its visibility timeout
      if (stored.receiptHandle) byReceipt.delete(stored.receiptHandle);

      const receiptHandle = randomUUID();
      stored.receiptHandle = receiptHandle;
      stored.receiveCount += 1;
      stored.visibleAt = at + options.visibilityTimeoutMs;
      byReceipt.set(receiptHandle, stored.messageId);

      received.push({
        messageId: stored.messageId,
        receiptHandle,
        body: stored.body,
        receiveCount: stored.receiveCount,
        enqueuedAt: stored.enqueuedAt,
      });
    }

    return ok(received);
  };

  const ack = async (receiptHandle: string): Promise<Result<void, QueueError>> => {
    const stored = findByReceipt(receiptHandle);
    if (!stored) return err(receiptInvalid(receiptHandle));

    messages.delete(stored.messageId);
    byReceipt.delete(receiptHandle);
    return ok(undefined);
  };

  const release = async (
    receiptHandle: string,
    delayMs: number,
  ): Promise<Result<void, QueueError>> => {
    const stored = findByReceipt(receiptHandle);
    if (!stored) return err(receiptInvalid(receiptHandle));

    stored.visibleAt = now() + Math.max(0, delayMs);
    stored.receiptHandle = null;
    byReceipt.delete(receiptHandle);
    return ok(undefined);
  };

  const stats = (): QueueStats => {
    const at = now();
    let visible = 0;
    let inFlight = 0;
    let delayed = 0;
    for (const stored of messages.values()) {
      if (stored.visibleAt <= at) visible++;
      else if (stored.receiptHandle) inFlight++;
      else delayed++;
    }
    return { visible, inFlight, delayed };
  };

  return { enqueue, receive, ack, release, stats };
}
