/**
 * Device Module - Transform Tests
 */
import { describe, expect, it } from "vitest";

import {
  buildStatusPayload,
  buildStatusTopic,
  parsePress,
  parsePressTime,
  parsePressTopic,
} from "../transform.js";

const NOW = 1704067200000;

describe("parsePressTopic", () => {
  it("extracts device and button", () => {
    expect(parsePressTopic("buttons/3/1/press", "buttons")).toEqual({
      deviceId: "3",
      buttonIndex: 1,
    });
  });

  it("accepts a nested prefix", () => {
    expect(parsePressTopic("site/a/buttons/lobby/0/press", "site/a/buttons")).toEqual({
      deviceId: "lobby",
      buttonIndex: 0,
    });
  });

  it.each([
    "other/3/1/press",
    "buttons/3/1/status",
    "buttons/3/x/press",
    "buttons/3/-1/press",
    "buttons/3/1/press/extra",
    "buttons//1/press",
  ])("rejects %s", (topic) => {
    expect(parsePressTopic(topic, "buttons")).toBeNull();
  });
});

describe("parsePressTime", () => {
  it("uses now for an empty payload", () => {
    expect(parsePressTime(Buffer.from(""), NOW)).toBe(NOW);
  });

  it("uses now when no time is given", () => {
    expect(parsePressTime("{}", NOW)).toBe(NOW);
  });

  it("accepts epoch milliseconds", () => {
    expect(parsePressTime(JSON.stringify({ time: 1704060000000 }), NOW)).toBe(1704060000000);
  });

  it("accepts an ISO timestamp", () => {
    expect(parsePressTime(JSON.stringify({ time: "2024-01-01T00:00:05.000Z" }), NOW)).toBe(
      1704067205000,
    );
  });

  it("rejects invalid JSON and invalid times", () => {
    expect(parsePressTime("not json", NOW)).toBeNull();
    expect(parsePressTime(JSON.stringify({ time: "yesterday" }), NOW)).toBeNull();
  });

  it.each([1e20, -5, 1.5])("rejects the out-of-range time %s", (time) => {
    expect(parsePressTime(JSON.stringify({ time }), NOW)).toBeNull();
  });

  it("rejects an ISO timestamp before the epoch", () => {
    expect(parsePressTime(JSON.stringify({ time: "1969-12-31T23:59:59.000Z" }), NOW)).toBeNull();
  });
});

describe("parsePress", () => {
  it("combines topic and payload", () => {
    expect(parsePress("buttons/3/1/press", "", "buttons", NOW)).toEqual({
      deviceId: "3",
      buttonIndex: 1,
      capturedAt: NOW,
    });
  });

  it("returns null for a foreign topic", () => {
    expect(parsePress("buttons/3/1/status", "", "buttons", NOW)).toBeNull();
  });

  it("returns null for a time that is not a valid timestamp", () => {
    expect(parsePress("buttons/3/1/press", '{"time":1e20}', "buttons", NOW)).toBeNull();
  });
});

describe("status messages", () => {
  it("builds the status topic", () => {
    expect(buildStatusTopic("buttons", "3", 1)).toBe("buttons/3/1/status");
  });

  it("leaves out null fields", () => {
    const payload = buildStatusPayload({
      deviceId: "3",
      buttonIndex: 1,
      status: "error",
      stage: "press",
      eventId: null,
      reason: "Button 1 on device 3 is disabled",
    });

    expect(JSON.parse(payload)).toEqual({
      status: "error",
      stage: "press",
      reason: "Button 1 on device 3 is disabled",
    });
  });

  it("includes the event id once there is one", () => {
    const payload = buildStatusPayload({
      deviceId: "3",
      buttonIndex: 1,
      status: "ok",
      stage: "delivery",
      eventId: "event-1",
      reason: null,
    });

    expect(JSON.parse(payload)).toEqual({ status: "ok", stage: "delivery", eventId: "event-1" });
  });
});
