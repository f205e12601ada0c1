/**
 * Events Module - Pure Transformations
 *
 * Event construction and message rendering.
 * No side effects, no I/O - just data in, data out.
 */
import type { ButtonConfig } from "../button-config/index.js";
import type { ButtonEvent } from "./schema.js";
import { ButtonEventSchema, DEFAULT_MESSAGE } from "./schema.js";

/**
 * Create an immutable event. The config is copied by value so a later
 * table refresh can never alter an in-flight event.
 */
export function createButtonEvent(
  id: string,
  deviceId: string,
  buttonIndex: number,
  capturedAt: number,
  config: ButtonConfig,
): ButtonEvent {
  return Object.freeze({
    id,
    deviceId,
    buttonIndex,
    capturedAt,
    config: Object.freeze({ ...config }),
    attempt: 0,
  });
}

/**
 * Copy of the event with a new delivery attempt count.
 */
export function withAttempt(event: ButtonEvent, attempt: number): ButtonEvent {
  return Object.freeze({ ...event, attempt });
}

/**
 * Render the config template for an event.
 *
 * Placeholders: {device}, {button}, {time} (ISO capture time), {id}.
 * Unknown placeholders are left as written.
 */
export function renderMessage(event: ButtonEvent): string {
  const { template } = event.config;
  if (template.trim() === "") return DEFAULT_MESSAGE;

  const values: Record<string, string> = {
    device: event.deviceId,
    button: String(event.buttonIndex),
    time: new Date(event.capturedAt).toISOString(),
    id: event.id,
  };

  return template.replace(/\{(\w+)\}/g, (match, key: string) => values[key] ?? match);
}

/**
 * Serialize an event for the queue.
 */
export function serializeEvent(event: ButtonEvent): string {
  return JSON.stringify(event);
}

/**
 * Parse a queue body back into an event. Returns null if malformed.
 */
export function parseEvent(body: string): ButtonEvent | null {
  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch {
    return null;
  }

  const parsed = ButtonEventSchema.safeParse(data);
  if (!parsed.success) return null;

  return Object.freeze({
    ...parsed.data,
    config: Object.freeze({ ...parsed.data.config }),
  });
}
