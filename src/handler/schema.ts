/**
 * Handler Module - Types
 *
 * Per-event state machine:
 * RECEIVED → DISPATCHING → {MESSAGE_OK|MESSAGE_FAILED} × {LOG_OK|LOG_FAILED} → REPORTED
 */
import type { SinkName } from "../sinks/index.js";
import type { DeliveryVerdict } from "../transport/index.js";

export type MessageStatus = "MESSAGE_OK" | "MESSAGE_FAILED";
export type LogStatus = "LOG_OK" | "LOG_FAILED";

export type HandlerState =
  | Readonly<{ phase: "RECEIVED" }>
  | Readonly<{ phase: "DISPATCHING" }>
  | Readonly<{ phase: "RESOLVED"; message: MessageStatus; log: LogStatus }>
  | Readonly<{ phase: "REPORTED"; message: MessageStatus; log: LogStatus }>;

/**
 * Result of one sink for one delivery, after its retries.
 */
export type DeliveryOutcome = Readonly<{
  eventId: string;
  sink: SinkName;
  ok: boolean;
  error: string | null;
  /** Sink-level attempts used */
  attempt: number;
  /** Posted message ts / appended range on success */
  detail: string | null;
}>;

export type DeliveryOutcomes = Readonly<{
  message: DeliveryOutcome;
  log: DeliveryOutcome;
}>;

/**
 * Which sink results acknowledge an event to the transport.
 * - message: the message sink succeeded
 * - any: either sink succeeded
 * - all: both sinks succeeded
 */
export type AckPolicy = "message" | "any" | "all";

export type HandleResult = Readonly<{
  outcomes: DeliveryOutcomes;
  verdict: DeliveryVerdict;
  states: ReadonlyArray<HandlerState>;
}>;
