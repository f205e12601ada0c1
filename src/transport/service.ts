/**
 * Transport Module - Service Layer
 *
 * Device side: `submit` enqueues and returns immediately.
 * Remote side: a polling worker receives events, hands them to the
 * handler and acks, releases with backoff, or dead-letters them.
 * Delivery is at-least-once; the handler must tolerate duplicates.
 */
import { type Result, err, ok } from "neverthrow";

import type { ButtonEvent } from "../events/index.js";
import { parseEvent, serializeEvent, withAttempt } from "../events/index.js";
import { createLogger, logOperationFailed } from "../logger.js";
import { formatQueueError, type MessageQueue, type QueueMessage } from "../queue/index.js";
import { type Sleep, sleep } from "../retry.js";
import type { DeadLetterStore } from "./dead-letters.js";
import type { TransportError } from "./errors.js";
import { submissionFailed } from "./errors.js";
import type {
  DeadLetterRecord,
  DeliveryVerdict,
  EventHandler,
  SubmissionReceipt,
  TransportOptions,
} from "./schema.js";
import {
  createDeadLetterRecord,
  isFinalAttempt,
  redeliveryDelayMs,
} from "./transform.js";

const log = createLogger("transport");

export type Transport = Readonly<{
  submit: (event: ButtonEvent) => Promise<Result<SubmissionReceipt, TransportError>>;
  /** One receive/handle cycle. Returns the number of messages handled. */
  processOnce: (handler: EventHandler) => Promise<number>;
  start: (handler: EventHandler) => void;
  stop: () => Promise<void>;
  isRunning: () => boolean;
}>;

export type TransportDependencies = Readonly<{
  queue: MessageQueue;
  deadLetters: DeadLetterStore;
  options: TransportOptions;
  onDeadLetter?: (record: DeadLetterRecord) => Promise<void>;
  now?: () => number;
  wait?: Sleep;
}>;

export function createTransport(deps: TransportDependencies): Transport {
  const { queue, deadLetters, options } = deps;
  const now = deps.now ?? Date.now;
  const wait = deps.wait ?? sleep;

  let running = false;
  let loop: Promise<void> | null = null;

  // ===========================================================================
  // Device side
  // ===========================================================================

  const submit = async (
    event: ButtonEvent,
  ): Promise<Result<SubmissionReceipt, TransportError>> => {
    const enqueued = await queue.enqueue(serializeEvent(event));

    if (enqueued.isErr()) {
      const message = formatQueueError(enqueued.error);
      log.error({ eventId: event.id, error: message }, "Event submission failed");
      return err(submissionFailed(event.id, message));
    }

    log.info(
      { eventId: event.id, messageId: enqueued.value },
      "Event submitted",
    );
    return ok({
      eventId: event.id,
      messageId: enqueued.value,
      submittedAt: now(),
    });
  };

  // ===========================================================================
  // Remote side
  // ===========================================================================

  const deadLetter = async (
    message: QueueMessage,
    event: ButtonEvent | null,
    reason: string,
  ): Promise<void> => {
    const record = createDeadLetterRecord(
      event?.id ?? message.messageId,
      event,
      message.body,
      message.receiveCount,
      reason,
      now(),
    );

    const added = deadLetters.add(record);
    if (added) {
      log.error(
        { eventId: record.key, attempts: record.attempts, reason },
        "Event dead-lettered",
      );
    } else {
      log.warn({ eventId: record.key }, "Event already dead-lettered - dropping redelivery");
    }

    const acked = await queue.ack(message.receiptHandle);
    if (acked.isErr()) {
      log.warn(
        { eventId: record.key, error: formatQueueError(acked.error) },
        "Dead-lettered message could not be acked",
      );
    }

    if (added && deps.onDeadLetter) {
      await deps.onDeadLetter(record);
    }
  };

  const runHandler = async (
    handler: EventHandler,
    event: ButtonEvent,
  ): Promise<DeliveryVerdict> => {
    try {
      return await handler(event);
    } catch (error) {
      logOperationFailed(log, "handleEvent", error, { eventId: event.id });
      return {
        acknowledge: false,
        reason: error instanceof Error ? error.message : String(error),
      };
    }
  };

  const processMessage = async (
    handler: EventHandler,
    message: QueueMessage,
  ): Promise<void> => {
    const parsed = parseEvent(message.body);
    if (!parsed) {
      await deadLetter(message, null, "Malformed event body");
      return;
    }

    const event = withAttempt(parsed, message.receiveCount);

    // redelivered past the ceiling (e.g. a worker died mid-delivery)
    if (event.attempt > options.maxAttempts) {
      await deadLetter(message, event, "Attempt ceiling exceeded");
      return;
    }

    log.debug({ eventId: event.id, attempt: event.attempt }, "Delivering event");
    const verdict = await runHandler(handler, event);

    if (verdict.acknowledge) {
      const acked = await queue.ack(message.receiptHandle);
      if (acked.isErr()) {
        log.warn(
          { eventId: event.id, error: formatQueueError(acked.error) },
          "Ack failed - event will be redelivered",
        );
      }
      return;
    }

    const reason = verdict.reason ?? "Delivery not acknowledged";

    if (isFinalAttempt(event.attempt, options.maxAttempts)) {
      await deadLetter(message, event, reason);
      return;
    }

    const delayMs = redeliveryDelayMs(event.attempt, options);
    log.warn(
      { eventId: event.id, attempt: event.attempt, delayMs, reason },
      "Delivery failed - scheduling redelivery",
    );

    const released = await queue.release(message.receiptHandle, delayMs);
    if (released.isErr()) {
      log.warn(
        { eventId: event.id, error: formatQueueError(released.error) },
        "Release failed - event returns after visibility timeout",
      );
    }
  };

  const receiveUpTo = async (maxMessages: number): Promise<QueueMessage[]> => {
    const received = await queue.receive(maxMessages);
    if (received.isErr()) {
      log.error({ error: formatQueueError(received.error) }, "Queue receive failed");
      return [];
    }
    return received.value;
  };

  const processOnce = async (handler: EventHandler): Promise<number> => {
    const received = await receiveUpTo(options.batchSize);
    await Promise.all(received.map((message) => processMessage(handler, message)));
    return received.length;
  };

  // Up to batchSize messages in flight; a slot is refilled as soon as its
  // message is done, so one slow event does not hold back the rest.
  const runLoop = async (handler: EventHandler): Promise<void> => {
    const active = new Set<Promise<void>>();

    while (running) {
      const free = options.batchSize - active.size;
      if (free <= 0) {
        await Promise.race(active);
        continue;
      }

      const received = await receiveUpTo(free);
      for (const message of received) {
        const task: Promise<void> = processMessage(handler, message)
          .catch((error: unknown) => {
            logOperationFailed(log, "processMessage", error, { messageId: message.messageId });
          })
          .finally(() => {
            active.delete(task);
          });
        active.add(task);
      }

      if (received.length === 0) {
        const idle = wait(options.pollIntervalMs);
        await (active.size > 0 ? Promise.race([...active, idle]) : idle);
      }
    }

    await Promise.all(active);
  };

  const start = (handler: EventHandler): void => {
    if (running) {
      log.warn("Transport worker already running");
      return;
    }

    running = true;
    log.info(
      { maxAttempts: options.maxAttempts, batchSize: options.batchSize },
      "Transport worker started",
    );

    loop = runLoop(handler).catch((error: unknown) => {
      running = false;
      logOperationFailed(log, "transportLoop", error);
    });
  };

  const stop = async (): Promise<void> => {
    running = false;
    if (loop) {
      await loop;
      loop = null;
      log.info("Transport worker stopped");
    }
  };

  return {
    submit,
    processOnce,
    start,
    stop,
    isRunning: () => running,
  };
}
