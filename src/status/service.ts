/**
 * Status Module - Service Layer
 *
 * Best-effort: display failures are logged, never returned or thrown.
 */
import type { ButtonEvent } from "../events/index.js";
import type { DeliveryOutcomes } from "../handler/schema.js";
import { createLogger } from "../logger.js";
import type { DeadLetterRecord } from "../transport/index.js";
import type { DeviceDisplay, StatusUpdate } from "./schema.js";
import { deadLetterStatus, deliveryStatus, rejectedStatus } from "./transform.js";

const log = createLogger("status");

export type StatusReporter = Readonly<{
  report: (event: ButtonEvent, outcomes: DeliveryOutcomes) => Promise<void>;
  reportRejected: (deviceId: string, buttonIndex: number, reason: string) => Promise<void>;
  reportDeadLettered: (record: DeadLetterRecord) => Promise<void>;
}>;

export function createStatusReporter(display: DeviceDisplay): StatusReporter {
  const show = async (update: StatusUpdate): Promise<void> => {
    try {
      const result = await display.showStatus(update);
      if (result.isErr()) {
        log.warn(
          { eventId: update.eventId, deviceId: update.deviceId, error: result.error.message },
          "Status not delivered to device",
        );
        return;
      }
      log.debug(
        {
          eventId: update.eventId,
          deviceId: update.deviceId,
          buttonIndex: update.buttonIndex,
          status: update.status,
          stage: update.stage,
        },
        "Status shown",
      );
    } catch (error) {
      log.warn(
        {
          eventId: update.eventId,
          deviceId: update.deviceId,
          error: error instanceof Error ? error.message : String(error),
        },
        "Status display threw",
      );
    }
  };

  return {
    report: (event, outcomes) => show(deliveryStatus(event, outcomes)),
    reportRejected: (deviceId, buttonIndex, reason) =>
      show(rejectedStatus(deviceId, buttonIndex, reason)),
    reportDeadLettered: async (record) => {
      const update = deadLetterStatus(record);
      if (!update) {
        log.warn({ key: record.key }, "Dead letter has no device to notify");
        return;
      }
      await show(update);
    },
  };
}
