/**
 * Sinks Module - Service Layer
 *
 * MessageSink posts to Slack; LogSink appends to the event's log tab.
 * Sinks do not enforce uniqueness: the event id in the message metadata
 * and in the row identifies duplicates caused by redelivery.
 */
import { type Result, err, ok } from "neverthrow";

import type { ButtonEvent } from "../events/index.js";
import { renderMessage } from "../events/index.js";
import { createLogger } from "../logger.js";
import type { SheetsClient } from "../sheets/index.js";
import type { SinkError } from "./errors.js";
import {
  invalidResponse,
  networkError,
  notConfigured,
  sendFailed,
  timeout,
} from "./errors.js";
import type { MessageSinkOptions, Sink, SinkReceipt, SlackConfig } from "./schema.js";
import { SlackPostMessageResponseSchema } from "./schema.js";
import {
  buildLogRow,
  buildSlackRequest,
  isRetryableSlackError,
  sheetsToSinkError,
} from "./transform.js";

const log = createLogger("sinks");

// =============================================================================
// Message Sink (Slack)
// =============================================================================

async function postToSlack(
  config: SlackConfig,
  event: ButtonEvent,
  options: MessageSinkOptions,
): Promise<Result<SinkReceipt, SinkError>> {
  const payload = buildSlackRequest(event, options.footer);
  const url = `${config.apiUrl}/chat.postMessage`;

  log.debug({ eventId: event.id, channel: payload.channel }, "Posting message...");

  try {
    const response = await fetch(url, {
      method: "POST",
      headers: {
        Accept: "application/json",
        "Content-Type": "application/json; charset=utf-8",
        Authorization: `Bearer ${config.botToken}`,
      },
      body: JSON.stringify(payload),
      signal: AbortSignal.timeout(config.timeoutMs),
    });

    if (!response.ok) {
      const errorText = await response.text().catch(() => "Unknown error");
      const retryable = response.status >= 500 || response.status === 429;
      return err(
        sendFailed(
          `Slack API returned ${response.status}: ${errorText}`,
          retryable,
          response.status,
        ),
      );
    }

    const parsed = SlackPostMessageResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      return err(invalidResponse("Unexpected chat.postMessage payload"));
    }

    if (!parsed.data.ok) {
      const code = parsed.data.error ?? "unknown_error";
      return err(sendFailed(`Slack error: ${code}`, isRetryableSlackError(code)));
    }

    const { ts } = parsed.data;
    log.info({ eventId: event.id, channel: parsed.data.channel, ts }, "Message posted");

    if (ts && options.onPosted) {
      options.onPosted({
        event,
        channel: parsed.data.channel ?? payload.channel,
        ts,
        text: renderMessage(event),
      });
    }
    return ok({ detail: ts ?? null });
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));

    if (cause.name === "TimeoutError" || cause.name === "AbortError") {
      return err(timeout(`No response within ${config.timeoutMs}ms`));
    }

    return err(networkError("Failed to reach Slack API", cause));
  }
}

/**
 * Create the chat-messaging sink. Without Slack config every delivery
 * fails with NOT_CONFIGURED (not retried).
 */
export function createMessageSink(
  config: SlackConfig | null,
  options: MessageSinkOptions = {},
): Sink {
  return {
    name: "message",
    deliver: async (event) => {
      if (!config) {
        return err(notConfigured("Slack bot token missing (SLACK_BOT_TOKEN)"));
      }
      return postToSlack(config, event, options);
    },
  };
}

// =============================================================================
// Log Sink (Google Sheets)
// =============================================================================

/**
 * Create the spreadsheet-logging sink.
 */
export function createLogSink(client: SheetsClient | null): Sink {
  return {
    name: "log",
    deliver: async (event) => {
      if (!client) {
        return err(
          notConfigured("Sheets not configured (SHEETS_SPREADSHEET_ID or SHEETS_ACCESS_TOKEN missing)"),
        );
      }

      const row = buildLogRow(event);
      const appended = await client.appendRow(event.config.tab, row);
      if (appended.isErr()) return err(sheetsToSinkError(appended.error));

      log.info(
        { eventId: event.id, tab: event.config.tab, range: appended.value.updatedRange },
        "Log row written",
      );
      return ok({ detail: appended.value.updatedRange });
    },
  };
}
