/**
 * Button Config Module - Transform Tests
 */
import { describe, expect, it } from "vitest";

import {
  buildConfigTable,
  describeCache,
  gridToRows,
  lookupButton,
  normalizeHeader,
  parseConfigRow,
} from "../transform.js";

const HEADER = [
  "Device ID",
  "Button #",
  "Channel ID",
  "Message",
  "Log Tab",
  "Enabled",
  "Rate Limit (seconds)",
];

// =============================================================================
// normalizeHeader
// =============================================================================

describe("normalizeHeader", () => {
  it.each([
    ["Device ID", "device_id"],
    ["Button #", "button_num"],
    ["Rate Limit (seconds)", "rate_limit_seconds"],
    ["  Channel   ID ", "channel_id"],
  ])("normalizes %j to %s", (title, key) => {
    expect(normalizeHeader(title)).toBe(key);
  });
});

// =============================================================================
// gridToRows
// =============================================================================

describe("gridToRows", () => {
  it("keys cells by normalized header and numbers rows from 2", () => {
    const rows = gridToRows([
      ["Device ID", "Button #"],
      ["3", "1"],
    ]);

    expect(rows).toEqual([{ rowNumber: 2, fields: { device_id: "3", button_num: "1" } }]);
  });

  it("skips blank rows but keeps sheet numbering", () => {
    const rows = gridToRows([["Device ID"], ["", ""], ["7"]]);

    expect(rows).toEqual([{ rowNumber: 3, fields: { device_id: "7" } }]);
  });

  it("fills cells missing from a short row with empty strings", () => {
    const rows = gridToRows([["Device ID", "Message"], ["3"]]);

    expect(rows[0]?.fields).toEqual({ device_id: "3", message: "" });
  });

  it("returns nothing for an empty grid", () => {
    expect(gridToRows([])).toEqual([]);
  });
});

// =============================================================================
// parseConfigRow
// =============================================================================

describe("parseConfigRow", () => {
  it("parses a complete row", () => {
    const [row] = gridToRows([
      HEADER,
      ["3", "1", "C-HELP", "Help requested at {device}:{button}", "Presses", "yes", "30"],
    ]);
    if (!row) throw new Error("row expected");

    const result = parseConfigRow(row);

    expect(result._unsafeUnwrap()).toEqual({
      deviceId: "3",
      buttonIndex: 1,
      channel: "C-HELP",
      template: "Help requested at {device}:{button}",
      tab: "Presses",
      enabled: true,
      rateLimitSeconds: 30,
    });
  });

  it("applies defaults for blank optional cells", () => {
    const result = parseConfigRow({
      rowNumber: 2,
      fields: { device_id: "3", button_num: "2", channel_id: "C-1", enabled: "", message: "" },
    });

    expect(result._unsafeUnwrap()).toEqual({
      deviceId: "3",
      buttonIndex: 2,
      channel: "C-1",
      template: "",
      tab: "Log",
      enabled: true,
      rateLimitSeconds: 0,
    });
  });

  it("accepts alias headers", () => {
    const result = parseConfigRow({
      rowNumber: 2,
      fields: { device: "lobby", button: "0", slack_channel: "C-9", active: "no" },
    });

    expect(result._unsafeUnwrap()).toMatchObject({
      deviceId: "lobby",
      buttonIndex: 0,
      channel: "C-9",
      enabled: false,
    });
  });

  it("rejects a row without a channel", () => {
    const result = parseConfigRow({
      rowNumber: 4,
      fields: { device_id: "3", button_num: "1" },
    });

    expect(result._unsafeUnwrapErr()).toBe("channel: Required");
  });

  it("rejects a non-integer button number", () => {
    const result = parseConfigRow({
      rowNumber: 4,
      fields: { device_id: "3", button_num: "1.5", channel_id: "C-1" },
    });

    expect(result._unsafeUnwrapErr()).toBe("buttonIndex: button number must be an integer");
  });

  it("rejects an unrecognized enabled value", () => {
    const result = parseConfigRow({
      rowNumber: 4,
      fields: { device_id: "3", button_num: "1", channel_id: "C-1", enabled: "maybe" },
    });

    expect(result._unsafeUnwrapErr()).toBe('enabled: Unrecognized enabled value "maybe"');
  });

  it("returns a frozen config", () => {
    const result = parseConfigRow({
      rowNumber: 2,
      fields: { device_id: "3", button_num: "1", channel_id: "C-1" },
    });

    expect(Object.isFrozen(result._unsafeUnwrap())).toBe(true);
  });
});

// =============================================================================
// buildConfigTable / lookupButton
// =============================================================================

describe("buildConfigTable", () => {
  const rows = gridToRows([
    HEADER,
    ["3", "1", "C-HELP", "first", "", "", ""],
    ["3", "1", "C-OTHER", "second", "", "", ""],
    ["3", "", "C-HELP", "", "", "", ""],
    ["4", "2", "C-DESK", "", "", "no", ""],
  ]);

  it("keeps valid rows and rejects duplicates and malformed rows", () => {
    const table = buildConfigTable(rows, 1000);

    expect(table.buttons.size).toBe(2);
    expect(table.fetchedAt).toBe(1000);
    expect(table.rejected).toEqual([
      { rowNumber: 3, reason: "duplicate of device 3 button 1" },
      { rowNumber: 4, reason: "buttonIndex: Expected number, received nan" },
    ]);
  });

  it("keeps the first of two duplicate rows", () => {
    const table = buildConfigTable(rows, 1000);

    expect(lookupButton(table, "3", 1)?.template).toBe("first");
  });

  it("finds disabled buttons too", () => {
    const table = buildConfigTable(rows, 1000);

    expect(lookupButton(table, "4", 2)?.enabled).toBe(false);
  });

  it("returns null for unknown buttons", () => {
    const table = buildConfigTable(rows, 1000);

    expect(lookupButton(table, "3", 9)).toBeNull();
  });
});

// =============================================================================
// describeCache
// =============================================================================

describe("describeCache", () => {
  it("reports an empty cache", () => {
    expect(describeCache(null, 0, 500)).toEqual({
      loaded: false,
      buttonCount: 0,
      rejectedCount: 0,
      fetchedAt: null,
      expiresAt: null,
      stale: false,
    });
  });

  it("marks a table stale once its expiry passes", () => {
    const table = buildConfigTable([], 1000);

    expect(describeCache(table, 2000, 1999).stale).toBe(false);
    expect(describeCache(table, 2000, 2000).stale).toBe(true);
  });
});
