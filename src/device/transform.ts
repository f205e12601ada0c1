/**
 * Device Module - Pure Transformations
 *
 * Topic and payload parsing for the device bridge.
 */
import { CaptureTimeSchema } from "../events/index.js";
import type { StatusUpdate } from "../status/index.js";
import type { ButtonPress, StatusPayload } from "./schema.js";
import { PressMessageSchema } from "./schema.js";

const BUTTON_INDEX = /^\d+$/;

/**
 * Extract device and button from `<prefix>/<deviceId>/<buttonIndex>/press`.
 * Returns null for anything else.
 */
export function parsePressTopic(
  topic: string,
  prefix: string,
): Readonly<{ deviceId: string; buttonIndex: number }> | null {
  const head = `${prefix}/`;
  if (!topic.startsWith(head)) return null;

  const parts = topic.slice(head.length).split("/");
  if (parts.length !== 3) return null;

  const [deviceId, index, action] = parts;
  if (!deviceId || !index || action !== "press") return null;
  if (!BUTTON_INDEX.test(index)) return null;

  return { deviceId, buttonIndex: Number.parseInt(index, 10) };
}

/**
 * Capture time from a press payload, or `now` when the payload is empty.
 * Returns null if the payload is present but not a valid press message,
 * or names a time outside the range of a `Date`.
 */
export function parsePressTime(payload: Buffer | string, now: number): number | null {
  const text = (Buffer.isBuffer(payload) ? payload.toString() : payload).trim();
  if (text === "") return now;

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch {
    return null;
  }

  const parsed = PressMessageSchema.safeParse(data);
  if (!parsed.success) return null;

  const { time } = parsed.data;
  if (time === undefined) return now;
  if (typeof time === "number") return time;

  const parsedTime = CaptureTimeSchema.safeParse(Date.parse(time));
  return parsedTime.success ? parsedTime.data : null;
}

/**
 * Parse topic and payload into a press.
 */
export function parsePress(
  topic: string,
  payload: Buffer | string,
  prefix: string,
  now: number,
): ButtonPress | null {
  const target = parsePressTopic(topic, prefix);
  if (!target) return null;

  const capturedAt = parsePressTime(payload, now);
  if (capturedAt === null) return null;

  return { ...target, capturedAt };
}

export function buildStatusTopic(
  prefix: string,
  deviceId: string,
  buttonIndex: number,
): string {
  return `${prefix}/${deviceId}/${buttonIndex}/status`;
}

/**
 * Status payload; null fields are left out.
 */
export function buildStatusPayload(update: StatusUpdate): string {
  const payload: StatusPayload = {
    status: update.status,
    stage: update.stage,
    ...(update.eventId !== null ? { eventId: update.eventId } : {}),
    ...(update.reason !== null ? { reason: update.reason } : {}),
  };
  return JSON.stringify(payload);
}
