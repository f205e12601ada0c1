/**
 * Sinks Module - Pure Transformations
 *
 * Request and row construction. No side effects, no I/O.
 */
import type { ButtonEvent } from "../events/index.js";
import { renderMessage } from "../events/index.js";
import type { SheetsError } from "../sheets/index.js";
import { formatSheetsError, isRetryableSheetsError } from "../sheets/index.js";
import type { SinkError } from "./errors.js";
import { invalidResponse, networkError, sendFailed, timeout } from "./errors.js";
import type { LogRow, SlackPostMessageRequest } from "./schema.js";
import { LOG_OUTCOME_OK, RETRYABLE_SLACK_ERRORS } from "./schema.js";

/**
 * Build the chat.postMessage payload for an event.
 */
export function buildSlackRequest(
  event: ButtonEvent,
  footer?: string,
): SlackPostMessageRequest {
  const text = renderMessage(event);
  return {
    channel: event.config.channel,
    text: footer ? `${text}\n${footer}` : text,
    metadata: {
      event_type: "button_press",
      event_payload: {
        event_id: event.id,
        device_id: event.deviceId,
        button: event.buttonIndex,
      },
    },
  };
}

export function isRetryableSlackError(code: string): boolean {
  return RETRYABLE_SLACK_ERRORS.includes(code);
}

/**
 * Build the log row for an event.
 */
export function buildLogRow(event: ButtonEvent): LogRow {
  return [
    new Date(event.capturedAt).toISOString(),
    event.deviceId,
    event.buttonIndex,
    renderMessage(event),
    LOG_OUTCOME_OK,
    event.id,
  ];
}

/**
 * Map a Sheets client failure onto the sink error vocabulary.
 */
export function sheetsToSinkError(error: SheetsError): SinkError {
  switch (error.type) {
    case "REQUEST_FAILED":
      return sendFailed(
        formatSheetsError(error),
        isRetryableSheetsError(error),
        error.statusCode,
      );
    case "NETWORK_ERROR":
      return networkError(error.message, error.cause);
    case "TIMEOUT":
      return timeout(error.message);
    case "INVALID_RESPONSE":
      return invalidResponse(error.message);
  }
}
