/**
 * Device Module - Schemas and Types
 *
 * Wire format of the device bridge.
 * Topic layout: <prefix>/<deviceId>/<buttonIndex>/press|status
 */
import { z } from "zod";

import { CaptureTimeSchema } from "../events/index.js";

// =============================================================================
// Press Messages (device → relay)
// =============================================================================

/**
 * Payload of a press topic. An empty payload is a press at receive time.
 */
export const PressMessageSchema = z.object({
  time: z
    .union([CaptureTimeSchema, z.string().datetime({ offset: true })])
    .optional()
    .describe("Capture time as epoch ms or ISO 8601"),
});

export type PressMessage = z.infer<typeof PressMessageSchema>;

/**
 * A parsed button press.
 */
export type ButtonPress = Readonly<{
  deviceId: string;
  buttonIndex: number;
  capturedAt: number;
}>;

// =============================================================================
// Status Messages (relay → device)
// =============================================================================

export type StatusPayload = Readonly<{
  status: "ok" | "error";
  stage: "press" | "delivery";
  eventId?: string;
  reason?: string;
}>;
