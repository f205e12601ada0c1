/**
 * Follow-up Module - Schemas and Types
 *
 * When a posted message's response window ends, its thread is read back
 * and the message is marked with what happened.
 */
import { z } from "zod";

import type { SlackConfig } from "../sinks/index.js";

export type FollowUpConfig = Readonly<
  SlackConfig & {
    /** Time between posting and the thread check */
    windowMs: number;
  }
>;

export type FollowUpOutcome = "Resolved" | "Replied" | "Timed Out";

/**
 * Reactions on the posted message that close the request.
 */
export const RESOLVE_REACTIONS: ReadonlyArray<string> = ["white_check_mark", "+1"];

// =============================================================================
// Slack Web API
// =============================================================================

export const SlackThreadMessageSchema = z.object({
  ts: z.string(),
  reply_count: z.number().int().nonnegative().optional(),
  reactions: z
    .array(z.object({ name: z.string(), count: z.number().int().optional() }))
    .optional(),
});

export type SlackThreadMessage = z.infer<typeof SlackThreadMessageSchema>;

/**
 * conversations.replies response. The parent message comes first.
 */
export const SlackRepliesResponseSchema = z.object({
  ok: z.boolean(),
  error: z.string().optional(),
  messages: z.array(SlackThreadMessageSchema).optional(),
});

export const SlackUpdateResponseSchema = z.object({
  ok: z.boolean(),
  error: z.string().optional(),
});
