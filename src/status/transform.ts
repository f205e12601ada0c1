/**
 * Status Module - Pure Transformations
 */
import type { ButtonEvent } from "../events/index.js";
import type { DeliveryOutcomes } from "../handler/schema.js";
import type { DeadLetterRecord } from "../transport/index.js";
import type { StatusUpdate } from "./schema.js";

/**
 * Status after a delivery. The button shows ok once the message went out;
 * a failed log write is reported in `reason` only.
 */
export function deliveryStatus(
  event: ButtonEvent,
  outcomes: DeliveryOutcomes,
): StatusUpdate {
  const failures = [outcomes.message, outcomes.log]
    .filter((outcome) => !outcome.ok)
    .map((outcome) => `${outcome.sink}: ${outcome.error ?? "failed"}`);

  return {
    deviceId: event.deviceId,
    buttonIndex: event.buttonIndex,
    status: outcomes.message.ok ? "ok" : "error",
    stage: "delivery",
    eventId: event.id,
    reason: failures.length > 0 ? failures.join("; ") : null,
  };
}

/**
 * Status for a press rejected before reaching the transport.
 */
export function rejectedStatus(
  deviceId: string,
  buttonIndex: number,
  reason: string,
): StatusUpdate {
  return {
    deviceId,
    buttonIndex,
    status: "error",
    stage: "press",
    eventId: null,
    reason,
  };
}

/**
 * Status for a permanently failed event. Null if the event could not be
 * parsed (no device to address).
 */
export function deadLetterStatus(record: DeadLetterRecord): StatusUpdate | null {
  if (!record.event) return null;

  return {
    deviceId: record.event.deviceId,
    buttonIndex: record.event.buttonIndex,
    status: "error",
    stage: "delivery",
    eventId: record.event.id,
    reason: `dead-lettered after ${record.attempts} attempts: ${record.reason}`,
  };
}
