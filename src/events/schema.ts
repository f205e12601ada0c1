/**
 * Events Module - Schemas and Types
 *
 * An event is one button press plus the config snapshot it was built with.
 * The schema is used to validate event bodies read back from the queue.
 */
import { z } from "zod";

/**
 * Config snapshot as carried inside an event (already validated shape).
 */
export const ConfigSnapshotSchema = z.object({
  deviceId: z.string().min(1),
  buttonIndex: z.number().int().nonnegative(),
  channel: z.string().min(1),
  template: z.string(),
  tab: z.string().min(1),
  enabled: z.boolean(),
  rateLimitSeconds: z.number().nonnegative(),
});

/**
 * Largest epoch ms a `Date` can hold.
 */
export const MAX_CAPTURE_TIME_MS = 8.64e15;

export const CaptureTimeSchema = z
  .number()
  .int()
  .nonnegative()
  .max(MAX_CAPTURE_TIME_MS)
  .describe("Capture time (epoch ms), not delivery time");

export const ButtonEventSchema = z.object({
  id: z.string().uuid().describe("Event id, used for idempotency and log correlation"),
  deviceId: z.string().min(1),
  buttonIndex: z.number().int().nonnegative(),
  capturedAt: CaptureTimeSchema,
  config: ConfigSnapshotSchema,
  attempt: z.number().int().nonnegative().describe("Deliveries so far"),
});

export type ButtonEvent = Readonly<
  Omit<z.infer<typeof ButtonEventSchema>, "config"> & {
    config: Readonly<z.infer<typeof ConfigSnapshotSchema>>;
  }
>;

/**
 * Text used when a button has no message template.
 */
export const DEFAULT_MESSAGE = "Unknown button pressed.";
