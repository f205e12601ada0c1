/**
 * API Routes Integration Tests
 *
 * Real routing via app.request() over a relay wired with in-process fakes.
 */
import { err, ok } from "neverthrow";
import { type Mock, beforeEach, describe, expect, test, vi } from "vitest";

vi.mock("../../config.js", () => ({
  config: {
    LOG_LEVEL: "silent",
    NODE_ENV: "test",
  },
}));

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

import type { Hono } from "hono";
import type { ConfigSource, RawConfigRow } from "../../button-config/index.js";
import type { ButtonRelay } from "../../pipeline/index.js";
import { createButtonRelay } from "../../pipeline/index.js";
import { sendFailed } from "../../sinks/index.js";
import { createApp } from "../app.js";

const NOW = Date.parse("2024-01-01T09:30:00.000Z");

const rows: RawConfigRow[] = [
  {
    rowNumber: 2,
    fields: {
      device_id: "3",
      button_num: "1",
      channel_id: "C-HELP",
      message: "Help requested at {device}:{button}",
    },
  },
  {
    rowNumber: 3,
    fields: { device_id: "3", button_num: "2", channel_id: "C-HELP", rate_limit: "60" },
  },
];

describe("API Routes", () => {
  let app: Hono;
  let relay: ButtonRelay;
  let fetchAll: Mock<ConfigSource["fetchAll"]>;

  beforeEach(() => {
    fetchAll = vi.fn<ConfigSource["fetchAll"]>(async () => ok(rows));
    relay = createButtonRelay({
      configSource: { fetchAll },
      configTtlMs: 3_600_000,
      messageSink: {
        name: "message",
        deliver: async () => err(sendFailed("Slack error: channel_not_found", false)),
      },
      logSink: { name: "log", deliver: async () => ok({ detail: null }) },
      display: { showStatus: async () => ok(undefined) },
      transport: {
        maxAttempts: 1,
        backoffMs: 1000,
        maxBackoffMs: 60_000,
        pollIntervalMs: 5,
        batchSize: 10,
      },
      visibilityTimeoutMs: 30_000,
      sinkRetry: { maxAttempts: 1, backoffMs: 0 },
      sinkTimeoutMs: 1000,
      ackPolicy: "message",
      now: () => NOW,
    });
    app = createApp({ relay, isDeviceConnected: () => true, now: () => NOW });
  });

  function post(path: string, body: unknown) {
    return app.request(path, {
      method: "POST",
      headers: { "Content-Type": "application/json", "x-request-id": "test-request-id" },
      body: JSON.stringify(body),
    });
  }

  // ===========================================================================
  // Health Check
  // ===========================================================================

  describe("GET /api/health", () => {
    test("reports cache, queue and dead-letter state", async () => {
      // Arrange
      await relay.handlePress("3", 1, NOW);

      // Act
      const res = await app.request("/api/health", {
        headers: { "x-request-id": "test-request-id" },
      });

      // Assert
      expect(res.status).toBe(200);
      expect(res.headers.get("x-request-id")).toBe("test-request-id");
      expect(await res.json()).toEqual({
        status: "ok",
        timestamp: "2024-01-01T09:30:00.000Z",
        requestId: "test-request-id",
        version: "1.0.0",
        config: {
          loaded: true,
          buttonCount: 2,
          rejectedCount: 0,
          fetchedAt: NOW,
          expiresAt: NOW + 3_600_000,
          stale: false,
        },
        queue: { visible: 1, inFlight: 0, delayed: 0 },
        deadLetters: 0,
        worker: false,
        deviceConnected: true,
      });
    });

    test("generates a request id when none is sent", async () => {
      const res = await app.request("/api/health");

      expect(res.headers.get("x-request-id")).toMatch(/^[0-9a-f-]{36}$/);
    });
  });

  // ===========================================================================
  // Press
  // ===========================================================================

  describe("POST /api/press", () => {
    test("accepts a press and returns the event id", async () => {
      const res = await post("/api/press", { deviceId: "3", buttonIndex: 1 });

      expect(res.status).toBe(202);
      expect(await res.json()).toMatchObject({
        success: true,
        eventId: expect.stringMatching(/^[0-9a-f-]{36}$/),
      });
      expect(relay.queue.stats().visible).toBe(1);
    });

    test("returns 404 for an unknown button", async () => {
      const res = await post("/api/press", { deviceId: "9", buttonIndex: 1 });

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({
        success: false,
        error: "No config row for device 9 button 1",
        code: "CONFIG_NOT_FOUND",
        requestId: "test-request-id",
      });
    });

    test("returns 429 inside a rate-limit window", async () => {
      await post("/api/press", { deviceId: "3", buttonIndex: 2, time: NOW });

      const res = await post("/api/press", { deviceId: "3", buttonIndex: 2, time: NOW + 1000 });

      expect(res.status).toBe(429);
      expect(await res.json()).toMatchObject({
        code: "RATE_LIMITED",
        error: "Button 2 on device 3 is rate limited for 59s",
      });
    });

    test("returns 503 when the config source is down", async () => {
      fetchAll.mockResolvedValue(err({ message: "Timed out: No response within 5000ms" }));

      const res = await post("/api/press", { deviceId: "3", buttonIndex: 1 });

      expect(res.status).toBe(503);
      expect(await res.json()).toMatchObject({ code: "CONFIG_SOURCE_UNAVAILABLE" });
    });

    test("returns 400 for a time outside the range of a date", async () => {
      const res = await post("/api/press", { deviceId: "3", buttonIndex: 1, time: 1e20 });

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        success: false,
        error: expect.stringContaining("time"),
      });
      expect(relay.queue.stats().visible).toBe(0);
    });

    test("returns 500 when the relay throws", async () => {
      vi.spyOn(relay, "handlePress").mockRejectedValue(new Error("queue exploded"));

      const res = await post("/api/press", { deviceId: "3", buttonIndex: 1 });

      expect(res.status).toBe(500);
      expect(await res.json()).toEqual({ error: "queue exploded", requestId: "test-request-id" });
    });

    test("returns 400 for an invalid body", async () => {
      const res = await post("/api/press", { deviceId: "", buttonIndex: -1 });

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        success: false,
        error: expect.stringContaining("buttonIndex"),
      });
    });

    test("returns 400 for a non-JSON body", async () => {
      const res = await app.request("/api/press", { method: "POST", body: "press!" });

      expect(res.status).toBe(400);
    });
  });

  // ===========================================================================
  // Config
  // ===========================================================================

  describe("POST /api/config/refresh", () => {
    test("refetches the table", async () => {
      await relay.handlePress("3", 1, NOW);

      const res = await post("/api/config/refresh", {});

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        success: true,
        config: { loaded: true, buttonCount: 2 },
      });
      expect(fetchAll).toHaveBeenCalledTimes(2);
    });

    test("returns 503 when the source is down, even with a stale table", async () => {
      // Arrange
      await relay.handlePress("3", 1, NOW);
      fetchAll.mockResolvedValue(err({ message: "Sheets API returned 503: unavailable" }));

      // Act
      const res = await post("/api/config/refresh", {});

      // Assert
      expect(res.status).toBe(503);
      expect(await res.json()).toMatchObject({
        success: false,
        error: "Config source unavailable: Sheets API returned 503: unavailable",
      });
      expect(relay.resolver.status().loaded).toBe(true);
    });

    test("returns 503 when nothing can be loaded", async () => {
      fetchAll.mockResolvedValue(err({ message: "Network error: fetch failed" }));

      const res = await post("/api/config/refresh", {});

      expect(res.status).toBe(503);
      expect(await res.json()).toMatchObject({
        success: false,
        error: "Config source unavailable: Network error: fetch failed",
      });
    });
  });

  // ===========================================================================
  // Dead Letters
  // ===========================================================================

  describe("GET /api/dead-letters", () => {
    test("lists permanently failed events", async () => {
      // Arrange - one transport attempt, message sink rejects permanently
      const receipt = await relay.handlePress("3", 1, NOW);
      await relay.transport.processOnce(relay.handler.handleEvent);

      // Act
      const res = await app.request("/api/dead-letters");

      // Assert
      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        count: 1,
        records: [
          {
            eventId: receipt._unsafeUnwrap().eventId,
            deviceId: "3",
            buttonIndex: 1,
            attempts: 1,
            reason: "message: Send failed: Slack error: channel_not_found",
            deadLetteredAt: "2024-01-01T09:30:00.000Z",
          },
        ],
      });
    });
  });

  test("unknown paths return 404 JSON", async () => {
    const res = await app.request("/api/nope");

    expect(res.status).toBe(404);
    expect(await res.json()).toMatchObject({ error: "Not found" });
  });
});
