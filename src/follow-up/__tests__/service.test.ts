/**
 * Follow-up Service Tests
 *
 * Slack mocked at the fetch boundary; Sheets through a fake client.
 */
import { err, ok } from "neverthrow";
import { type Mock, afterEach, beforeEach, describe, expect, test, vi } from "vitest";

vi.mock("../../logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
  }),
  logOperationStart: vi.fn(),
  logOperationComplete: vi.fn(),
  logOperationFailed: vi.fn(),
}));

import { createButtonEvent } from "../../events/index.js";
import type { SheetsClient } from "../../sheets/index.js";
import { requestFailed } from "../../sheets/index.js";
import type { PostedMessage } from "../../sinks/index.js";
import { createFollowUpScheduler } from "../service.js";

const TS = "1704101400.000100";
const CHECKED_AT = Date.parse("2024-01-01T09:33:00.000Z");

const event = createButtonEvent(
  "3b241101-e2bb-4255-8caf-4136c566a962",
  "3",
  1,
  Date.parse("2024-01-01T09:30:00.000Z"),
  {
    deviceId: "3",
    buttonIndex: 1,
    channel: "C-HELP",
    template: "Help requested at {device}:{button}",
    tab: "Presses",
    enabled: true,
    rateLimitSeconds: 0,
  },
);

const posted: PostedMessage = { event, channel: "C0HELP", ts: TS, text: "Help requested at 3:1" };

const config = {
  apiUrl: "http://slack.test/api",
  botToken: "test-bot-token",
  timeoutMs: 1000,
  windowMs: 180_000,
};

function slackResponse(body: unknown, status = 200) {
  return {
    ok: status >= 200 && status < 300,
    status,
    json: () => Promise.resolve(body),
    text: () => Promise.resolve(JSON.stringify(body)),
  };
}

describe("Follow-up Service", () => {
  let appendRow: Mock<SheetsClient["appendRow"]>;
  let sheets: SheetsClient;

  beforeEach(() => {
    vi.clearAllMocks();
    appendRow = vi.fn<SheetsClient["appendRow"]>(async () =>
      ok({ updatedRange: "'Presses'!A3:F3", updatedRows: 1 }),
    );
    sheets = { getValues: vi.fn(), appendRow };
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.useRealTimers();
  });

  function stubSlack(replies: unknown, update: unknown = { ok: true }) {
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce(slackResponse(replies))
      .mockResolvedValueOnce(slackResponse(update));
    vi.stubGlobal("fetch", fetchMock);
    return fetchMock;
  }

  // ===========================================================================
  // followUp
  // ===========================================================================

  describe("followUp", () => {
    test("marks an unanswered message as timed out and logs it", async () => {
      // Arrange
      const fetchMock = stubSlack({ ok: true, messages: [{ ts: TS, reply_count: 0 }] });
      const scheduler = createFollowUpScheduler({ config, sheets, now: () => CHECKED_AT });

      // Act
      const result = await scheduler.followUp(posted);

      // Assert
      expect(result._unsafeUnwrap()).toBe("Timed Out");
      expect(fetchMock.mock.calls[0]?.[0]).toBe(
        "http://slack.test/api/conversations.replies?channel=C0HELP&ts=1704101400.000100",
      );
      expect(fetchMock.mock.calls[1]?.[0]).toBe("http://slack.test/api/chat.update");
      expect(JSON.parse(String(fetchMock.mock.calls[1]?.[1]?.body))).toEqual({
        channel: "C0HELP",
        ts: TS,
        text: "Help requested at 3:1\n_This request timed out with no reply._",
      });
      expect(appendRow).toHaveBeenCalledWith("Presses", [
        "2024-01-01T09:33:00.000Z",
        "3",
        1,
        "Help requested at 3:1",
        "Timed Out",
        event.id,
      ]);
    });

    test("marks a message with thread replies as replied", async () => {
      stubSlack({ ok: true, messages: [{ ts: TS, reply_count: 1 }, { ts: "1704101460.000200" }] });
      const scheduler = createFollowUpScheduler({ config, sheets, now: () => CHECKED_AT });

      const result = await scheduler.followUp(posted);

      expect(result._unsafeUnwrap()).toBe("Replied");
      expect(appendRow.mock.calls[0]?.[1]?.[4]).toBe("Replied");
    });

    test("leaves a resolved message unedited", async () => {
      const fetchMock = stubSlack({
        ok: true,
        messages: [{ ts: TS, reactions: [{ name: "white_check_mark", count: 1 }] }],
      });
      const scheduler = createFollowUpScheduler({ config, sheets, now: () => CHECKED_AT });

      const result = await scheduler.followUp(posted);

      expect(result._unsafeUnwrap()).toBe("Resolved");
      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(appendRow.mock.calls[0]?.[1]?.[4]).toBe("Resolved");
    });

    test("still logs the outcome when the edit is refused", async () => {
      stubSlack({ ok: true, messages: [{ ts: TS }] }, { ok: false, error: "cant_update_message" });
      const scheduler = createFollowUpScheduler({ config, sheets, now: () => CHECKED_AT });

      const result = await scheduler.followUp(posted);

      expect(result._unsafeUnwrap()).toBe("Timed Out");
      expect(appendRow).toHaveBeenCalledTimes(1);
    });

    test("returns SLACK_CALL_FAILED when the thread cannot be read", async () => {
      stubSlack({ ok: false, error: "channel_not_found" });
      const scheduler = createFollowUpScheduler({ config, sheets, now: () => CHECKED_AT });

      const result = await scheduler.followUp(posted);

      expect(result._unsafeUnwrapErr()).toEqual({
        type: "SLACK_CALL_FAILED",
        method: "conversations.replies",
        message: "Slack error: channel_not_found",
      });
      expect(appendRow).not.toHaveBeenCalled();
    });

    test("returns LOG_WRITE_FAILED when the row cannot be appended", async () => {
      stubSlack({ ok: true, messages: [{ ts: TS }] });
      appendRow.mockResolvedValue(err(requestFailed("denied", 403)));
      const scheduler = createFollowUpScheduler({ config, sheets, now: () => CHECKED_AT });

      const result = await scheduler.followUp(posted);

      expect(result._unsafeUnwrapErr().type).toBe("LOG_WRITE_FAILED");
    });

    test("skips the row without a Sheets client", async () => {
      stubSlack({ ok: true, messages: [{ ts: TS }] });
      const scheduler = createFollowUpScheduler({ config, sheets: null, now: () => CHECKED_AT });

      const result = await scheduler.followUp(posted);

      expect(result._unsafeUnwrap()).toBe("Timed Out");
    });
  });

  // ===========================================================================
  // schedule / stop
  // ===========================================================================

  describe("schedule", () => {
    test("checks the message once the window has passed", async () => {
      // Arrange
      vi.useFakeTimers();
      const fetchMock = stubSlack({ ok: true, messages: [{ ts: TS }] });
      const scheduler = createFollowUpScheduler({ config, sheets, now: () => CHECKED_AT });

      // Act
      scheduler.schedule(posted);
      scheduler.schedule(posted);
      await vi.advanceTimersByTimeAsync(179_999);

      // Assert
      expect(fetchMock).not.toHaveBeenCalled();
      expect(scheduler.pending()).toBe(1);

      await vi.advanceTimersByTimeAsync(1);
      await vi.waitFor(() => {
        expect(appendRow).toHaveBeenCalledTimes(1);
      });
      expect(scheduler.pending()).toBe(0);
    });

    test("stop drops pending follow-ups", async () => {
      vi.useFakeTimers();
      const fetchMock = stubSlack({ ok: true, messages: [{ ts: TS }] });
      const scheduler = createFollowUpScheduler({ config, sheets, now: () => CHECKED_AT });

      scheduler.schedule(posted);
      scheduler.stop();
      await vi.advanceTimersByTimeAsync(180_000);

      expect(scheduler.pending()).toBe(0);
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });
});
