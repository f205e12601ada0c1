/**
 * Transport Module - Pure Transformations
 *
 * Redelivery scheduling and dead-letter record construction.
 */
import type { ButtonEvent } from "../events/index.js";
import { computeBackoffMs } from "../retry.js";
import type { DeadLetterRecord, TransportOptions } from "./schema.js";

/**
 * Delay before the next delivery after a failed attempt.
 */
export function redeliveryDelayMs(attempt: number, options: TransportOptions): number {
  return computeBackoffMs(attempt, options.backoffMs, options.maxBackoffMs);
}

/**
 * True once the attempt ceiling is reached.
 */
export function isFinalAttempt(attempt: number, maxAttempts: number): boolean {
  return attempt >= maxAttempts;
}

export function createDeadLetterRecord(
  key: string,
  event: ButtonEvent | null,
  body: string,
  attempts: number,
  reason: string,
  now: number,
): DeadLetterRecord {
  return Object.freeze({
    key,
    event,
    body,
    attempts,
    reason,
    deadLetteredAt: now,
  });
}
