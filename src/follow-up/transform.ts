/**
 * Follow-up Module - Pure Transformations
 */
import type { LogRow, PostedMessage } from "../sinks/index.js";
import type { FollowUpOutcome, SlackThreadMessage } from "./schema.js";
import { RESOLVE_REACTIONS } from "./schema.js";

/**
 * "3 minutes", "1 minute", "45 seconds".
 */
export function formatWindow(windowMs: number): string {
  const seconds = Math.round(windowMs / 1000);
  if (seconds > 0 && seconds % 60 === 0) {
    const minutes = seconds / 60;
    return `${minutes} minute${minutes === 1 ? "" : "s"}`;
  }
  return `${seconds} second${seconds === 1 ? "" : "s"}`;
}

/**
 * Footer appended to posted messages while follow-up is on.
 */
export function buildInstructions(windowMs: number): string {
  return [
    `*To respond, reply to this message in a thread within ${formatWindow(windowMs)}*`,
    "*To resolve, react with :white_check_mark: or :+1:*",
  ].join("\n");
}

// skin-tone variants arrive as "+1::skin-tone-3"
function isResolveReaction(name: string): boolean {
  const [base = name] = name.split("::");
  return RESOLVE_REACTIONS.includes(base);
}

/**
 * A resolve reaction on the parent wins over replies.
 */
export function classifyThread(
  ts: string,
  messages: ReadonlyArray<SlackThreadMessage>,
): FollowUpOutcome {
  const parent = messages.find((message) => message.ts === ts);
  if (parent?.reactions?.some((reaction) => isResolveReaction(reaction.name))) {
    return "Resolved";
  }

  const replies = messages.filter((message) => message.ts !== ts).length;
  if (replies > 0 || (parent?.reply_count ?? 0) > 0) return "Replied";

  return "Timed Out";
}

/**
 * New text for the posted message, or null when it stays as is.
 */
export function buildMarkedText(text: string, outcome: FollowUpOutcome): string | null {
  switch (outcome) {
    case "Resolved":
      return null;
    case "Replied":
      return `${text}\n_Someone replied to this request._`;
    case "Timed Out":
      return `${text}\n_This request timed out with no reply._`;
  }
}

export function buildFollowUpRow(
  posted: PostedMessage,
  outcome: FollowUpOutcome,
  checkedAt: number,
): LogRow {
  return [
    new Date(checkedAt).toISOString(),
    posted.event.deviceId,
    posted.event.buttonIndex,
    posted.text,
    outcome,
    posted.event.id,
  ];
}
