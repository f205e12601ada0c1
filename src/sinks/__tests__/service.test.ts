/**
 * Sinks Service Tests
 *
 * Slack mocked at the fetch boundary; Sheets through a fake client.
 */
import { err, ok } from "neverthrow";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

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
import { createLogSink, createMessageSink } from "../service.js";

const EVENT_ID = "3b241101-e2bb-4255-8caf-4136c566a962";

const event = createButtonEvent(EVENT_ID, "3", 1, Date.parse("2024-01-01T09:30:00.000Z"), {
  deviceId: "3",
  buttonIndex: 1,
  channel: "C-HELP",
  template: "Help requested at {device}:{button}",
  tab: "Presses",
  enabled: true,
  rateLimitSeconds: 0,
});

const slackConfig = {
  apiUrl: "http://slack.test/api",
  botToken: "test-bot-token",
  timeoutMs: 1000,
};

function slackResponse(body: unknown, status = 200) {
  return {
    ok: status >= 200 && status < 300,
    status,
    json: () => Promise.resolve(body),
    text: () => Promise.resolve(JSON.stringify(body)),
  };
}

describe("Sinks Service", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  // ===========================================================================
  // Message Sink
  // ===========================================================================

  describe("message sink", () => {
    test("posts to chat.postMessage and returns the message ts", async () => {
      // Arrange
      vi.stubGlobal(
        "fetch",
        vi.fn().mockResolvedValue(slackResponse({ ok: true, channel: "C-HELP", ts: "1704101400.000100" })),
      );
      const sink = createMessageSink(slackConfig);

      // Act
      const result = await sink.deliver(event);

      // Assert
      expect(result._unsafeUnwrap()).toEqual({ detail: "1704101400.000100" });
      expect(fetch).toHaveBeenCalledWith(
        "http://slack.test/api/chat.postMessage",
        expect.objectContaining({
          method: "POST",
          headers: expect.objectContaining({ Authorization: "Bearer test-bot-token" }),
        }),
      );

      const callArgs = vi.mocked(fetch).mock.calls[0];
      const body = JSON.parse(String(callArgs?.[1]?.body));
      expect(body.channel).toBe("C-HELP");
      expect(body.text).toBe("Help requested at 3:1");
      expect(body.metadata.event_payload.event_id).toBe(EVENT_ID);
    });

    test("appends the footer and hands the posted message to onPosted", async () => {
      // Arrange
      vi.stubGlobal(
        "fetch",
        vi.fn().mockResolvedValue(slackResponse({ ok: true, channel: "C0HELP", ts: "1704101400.000100" })),
      );
      const onPosted = vi.fn();
      const sink = createMessageSink(slackConfig, { footer: "*Reply in a thread*", onPosted });

      // Act
      await sink.deliver(event);

      // Assert
      const body = JSON.parse(String(vi.mocked(fetch).mock.calls[0]?.[1]?.body));
      expect(body.text).toBe("Help requested at 3:1\n*Reply in a thread*");
      expect(onPosted).toHaveBeenCalledWith({
        event,
        channel: "C0HELP",
        ts: "1704101400.000100",
        text: "Help requested at 3:1",
      });
    });

    test("returns a non-retryable SEND_FAILED for a permanent Slack error", async () => {
      vi.stubGlobal(
        "fetch",
        vi.fn().mockResolvedValue(slackResponse({ ok: false, error: "channel_not_found" })),
      );
      const sink = createMessageSink(slackConfig);

      const result = await sink.deliver(event);

      expect(result._unsafeUnwrapErr()).toEqual({
        type: "SEND_FAILED",
        message: "Slack error: channel_not_found",
        retryable: false,
      });
    });

    test("returns a retryable SEND_FAILED when rate limited", async () => {
      vi.stubGlobal(
        "fetch",
        vi.fn().mockResolvedValue(slackResponse({ ok: false, error: "ratelimited" })),
      );
      const sink = createMessageSink(slackConfig);

      const result = await sink.deliver(event);

      expect(result._unsafeUnwrapErr()).toMatchObject({ type: "SEND_FAILED", retryable: true });
    });

    test("returns a retryable SEND_FAILED with the status for a 5xx", async () => {
      vi.stubGlobal("fetch", vi.fn().mockResolvedValue(slackResponse("upstream down", 502)));
      const sink = createMessageSink(slackConfig);

      const result = await sink.deliver(event);

      expect(result._unsafeUnwrapErr()).toEqual({
        type: "SEND_FAILED",
        message: 'Slack API returned 502: "upstream down"',
        retryable: true,
        statusCode: 502,
      });
    });

    test("returns TIMEOUT when the request times out", async () => {
      const abort = new Error("The operation was aborted due to timeout");
      abort.name = "TimeoutError";
      vi.stubGlobal("fetch", vi.fn().mockRejectedValue(abort));
      const sink = createMessageSink(slackConfig);

      const result = await sink.deliver(event);

      expect(result._unsafeUnwrapErr()).toEqual({
        type: "TIMEOUT",
        message: "No response within 1000ms",
      });
    });

    test("returns NOT_CONFIGURED without a bot token", async () => {
      vi.stubGlobal("fetch", vi.fn());
      const sink = createMessageSink(null);

      const result = await sink.deliver(event);

      expect(result._unsafeUnwrapErr().type).toBe("NOT_CONFIGURED");
      expect(fetch).not.toHaveBeenCalled();
    });
  });

  // ===========================================================================
  // Log Sink
  // ===========================================================================

  describe("log sink", () => {
    function fakeClient(appendRow: SheetsClient["appendRow"]): SheetsClient {
      return { getValues: vi.fn(), appendRow };
    }

    test("appends the row to the event's log tab", async () => {
      // Arrange
      const appendRow = vi.fn<SheetsClient["appendRow"]>(async () =>
        ok({ updatedRange: "'Presses'!A12:F12", updatedRows: 1 }),
      );
      const sink = createLogSink(fakeClient(appendRow));

      // Act
      const result = await sink.deliver(event);

      // Assert
      expect(result._unsafeUnwrap()).toEqual({ detail: "'Presses'!A12:F12" });
      expect(appendRow).toHaveBeenCalledWith("Presses", [
        "2024-01-01T09:30:00.000Z",
        "3",
        1,
        "Help requested at 3:1",
        "OK",
        EVENT_ID,
      ]);
    });

    test("maps a Sheets failure onto a sink error", async () => {
      const sink = createLogSink(fakeClient(async () => err(requestFailed("quota", 429))));

      const result = await sink.deliver(event);

      expect(result._unsafeUnwrapErr()).toEqual({
        type: "SEND_FAILED",
        message: "Sheets API returned 429: quota",
        retryable: true,
        statusCode: 429,
      });
    });

    test("returns NOT_CONFIGURED without a Sheets client", async () => {
      const sink = createLogSink(null);

      const result = await sink.deliver(event);

      expect(result._unsafeUnwrapErr().type).toBe("NOT_CONFIGURED");
    });
  });
});
