/**
 * Sinks Module - Schemas and Types
 *
 * A sink receives a one-way delivery derived from an event.
 */
import type { Result } from "neverthrow";
import { z } from "zod";

import type { ButtonEvent } from "../events/index.js";
import type { SinkError } from "./errors.js";

export type SinkName = "message" | "log";

/**
 * What a successful delivery produced (posted message ts, appended range).
 */
export type SinkReceipt = Readonly<{
  detail: string | null;
}>;

export type Sink = Readonly<{
  name: SinkName;
  deliver: (event: ButtonEvent) => Promise<Result<SinkReceipt, SinkError>>;
}>;

// =============================================================================
// Slack Web API
// =============================================================================

export type SlackConfig = Readonly<{
  apiUrl: string;
  botToken: string;
  timeoutMs: number;
}>;

/**
 * A message the relay posted, as needed to follow it up later.
 */
export type PostedMessage = Readonly<{
  event: ButtonEvent;
  channel: string;
  ts: string;
  /** Rendered text without the instruction footer */
  text: string;
}>;

export type MessageSinkOptions = Readonly<{
  /** Lines appended below the rendered message */
  footer?: string;
  onPosted?: (posted: PostedMessage) => void;
}>;

/**
 * chat.postMessage payload. The event id travels in message metadata so
 * duplicates from redelivery can be recognized.
 */
export type SlackPostMessageRequest = Readonly<{
  channel: string;
  text: string;
  metadata: Readonly<{
    event_type: "button_press";
    event_payload: Readonly<{
      event_id: string;
      device_id: string;
      button: number;
    }>;
  }>;
}>;

/**
 * chat.postMessage response. Slack answers HTTP 200 with ok=false on errors.
 */
export const SlackPostMessageResponseSchema = z.object({
  ok: z.boolean(),
  error: z.string().optional(),
  ts: z.string().optional(),
  channel: z.string().optional(),
});

export type SlackPostMessageResponse = z.infer<typeof SlackPostMessageResponseSchema>;

/**
 * Slack error codes worth another attempt.
 */
export const RETRYABLE_SLACK_ERRORS: ReadonlyArray<string> = [
  "ratelimited",
  "internal_error",
  "fatal_error",
  "service_unavailable",
  "request_timeout",
];

// =============================================================================
// Log Rows
// =============================================================================

/**
 * Outcome column written with each log row.
 */
export const LOG_OUTCOME_OK = "OK";

/**
 * (timestamp, device, button, message text, outcome, event id)
 */
export type LogRow = readonly [string, string, number, string, string, string];
