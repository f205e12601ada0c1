/**
 * Follow-up Module - Service Layer
 *
 * One timer per posted message. When it fires, the thread is read with
 * conversations.replies, the message is edited with chat.update and the
 * outcome is appended to the event's log tab.
 */
import { type Result, err, ok } from "neverthrow";

import {
  createLogger,
  logOperationComplete,
  logOperationFailed,
  logOperationStart,
} from "../logger.js";
import type { SheetsClient } from "../sheets/index.js";
import { formatSheetsError } from "../sheets/index.js";
import type { PostedMessage } from "../sinks/index.js";
import type { FollowUpError } from "./errors.js";
import { formatFollowUpError, logWriteFailed, slackCallFailed } from "./errors.js";
import type { FollowUpConfig, FollowUpOutcome, SlackThreadMessage } from "./schema.js";
import { SlackRepliesResponseSchema, SlackUpdateResponseSchema } from "./schema.js";
import { buildFollowUpRow, buildMarkedText, classifyThread } from "./transform.js";

const log = createLogger("follow-up");

export type FollowUpScheduler = Readonly<{
  /** Check the message once its response window has passed */
  schedule: (posted: PostedMessage) => void;
  /** Check the message now */
  followUp: (posted: PostedMessage) => Promise<Result<FollowUpOutcome, FollowUpError>>;
  pending: () => number;
  stop: () => void;
}>;

export type FollowUpDependencies = Readonly<{
  config: FollowUpConfig;
  sheets: SheetsClient | null;
  now?: () => number;
}>;

async function callSlack(
  config: FollowUpConfig,
  method: string,
  request: Readonly<{ query: Record<string, string> } | { body: unknown }>,
): Promise<Result<unknown, FollowUpError>> {
  const init: RequestInit =
    "query" in request ? { method: "GET" } : { method: "POST", body: JSON.stringify(request.body) };
  const url =
    "query" in request
      ? `${config.apiUrl}/${method}?${new URLSearchParams(request.query).toString()}`
      : `${config.apiUrl}/${method}`;

  try {
    const response = await fetch(url, {
      ...init,
      headers: {
        Accept: "application/json",
        "Content-Type": "application/json; charset=utf-8",
        Authorization: `Bearer ${config.botToken}`,
      },
      signal: AbortSignal.timeout(config.timeoutMs),
    });

    if (!response.ok) {
      return err(slackCallFailed(method, `Slack API returned ${response.status}`));
    }

    return ok(await response.json());
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return err(slackCallFailed(method, message));
  }
}

async function readThread(
  config: FollowUpConfig,
  posted: PostedMessage,
): Promise<Result<SlackThreadMessage[], FollowUpError>> {
  const method = "conversations.replies";
  const response = await callSlack(config, method, {
    query: { channel: posted.channel, ts: posted.ts },
  });
  if (response.isErr()) return err(response.error);

  const parsed = SlackRepliesResponseSchema.safeParse(response.value);
  if (!parsed.success) {
    return err(slackCallFailed(method, "Unexpected conversations.replies payload"));
  }
  if (!parsed.data.ok) {
    return err(slackCallFailed(method, `Slack error: ${parsed.data.error ?? "unknown_error"}`));
  }

  return ok(parsed.data.messages ?? []);
}

async function updateMessage(
  config: FollowUpConfig,
  posted: PostedMessage,
  text: string,
): Promise<Result<void, FollowUpError>> {
  const method = "chat.update";
  const response = await callSlack(config, method, {
    body: { channel: posted.channel, ts: posted.ts, text },
  });
  if (response.isErr()) return err(response.error);

  const parsed = SlackUpdateResponseSchema.safeParse(response.value);
  if (!parsed.success) {
    return err(slackCallFailed(method, "Unexpected chat.update payload"));
  }
  if (!parsed.data.ok) {
    return err(slackCallFailed(method, `Slack error: ${parsed.data.error ?? "unknown_error"}`));
  }

  return ok(undefined);
}

export function createFollowUpScheduler(deps: FollowUpDependencies): FollowUpScheduler {
  const { config } = deps;
  const now = deps.now ?? Date.now;
  const timers = new Map<string, ReturnType<typeof setTimeout>>();

  const followUp = async (
    posted: PostedMessage,
  ): Promise<Result<FollowUpOutcome, FollowUpError>> => {
    const eventId = posted.event.id;
    const startTime = Date.now();
    logOperationStart(log, "followUp", { eventId, ts: posted.ts });

    const thread = await readThread(config, posted);
    if (thread.isErr()) {
      log.warn({ eventId, error: formatFollowUpError(thread.error) }, "Thread could not be read");
      return err(thread.error);
    }

    const outcome = classifyThread(posted.ts, thread.value);

    // a failed edit still gets its outcome logged
    const marked = buildMarkedText(posted.text, outcome);
    if (marked !== null) {
      const updated = await updateMessage(config, posted, marked);
      if (updated.isErr()) {
        log.warn(
          { eventId, outcome, error: formatFollowUpError(updated.error) },
          "Message could not be marked",
        );
      }
    }

    if (deps.sheets) {
      const row = buildFollowUpRow(posted, outcome, now());
      const appended = await deps.sheets.appendRow(posted.event.config.tab, row);
      if (appended.isErr()) {
        const error = logWriteFailed(formatSheetsError(appended.error));
        log.error({ eventId, outcome, error: formatFollowUpError(error) }, "Follow-up row failed");
        return err(error);
      }
    }

    logOperationComplete(log, "followUp", startTime, { eventId, outcome });
    return ok(outcome);
  };

  const schedule = (posted: PostedMessage): void => {
    const eventId = posted.event.id;
    if (timers.has(eventId)) return;

    const timer = setTimeout(() => {
      timers.delete(eventId);
      followUp(posted).catch((error: unknown) => {
        logOperationFailed(log, "followUp", error, { eventId });
      });
    }, config.windowMs);

    timers.set(eventId, timer);
    log.debug({ eventId, windowMs: config.windowMs }, "Follow-up scheduled");
  };

  const stop = (): void => {
    for (const timer of timers.values()) clearTimeout(timer);
    if (timers.size > 0) log.info({ dropped: timers.size }, "Pending follow-ups dropped");
    timers.clear();
  };

  return { schedule, followUp, pending: () => timers.size, stop };
}
