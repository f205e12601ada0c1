/**
 * Button Config Module - Pure Transformations
 *
 * Sheet grid → validated, immutable config table.
 * No side effects, no I/O - just data in, data out.
 */
import { type Result, err, ok } from "neverthrow";

import type {
  ButtonConfig,
  ConfigCacheStatus,
  ConfigTable,
  RawConfigRow,
  RejectedRow,
} from "./schema.js";
import { ButtonConfigSchema, FIELD_ALIASES } from "./schema.js";

// =============================================================================
// Header Handling
// =============================================================================

/**
 * Normalize a header cell: "Button #" → "button_num",
 * "Rate Limit (seconds)" → "rate_limit_seconds".
 */
export function normalizeHeader(title: string): string {
  return title
    .trim()
    .toLowerCase()
    .replace(/#/g, "num")
    .replace(/[()]/g, "")
    .replace(/\s+/g, "_");
}

/**
 * Turn a grid (header row first) into header-keyed rows.
 * Rows with no non-blank cells are skipped.
 */
export function gridToRows(grid: ReadonlyArray<ReadonlyArray<string>>): RawConfigRow[] {
  const [header, ...body] = grid;
  if (!header) return [];

  const keys = header.map(normalizeHeader);

  return body.flatMap((cells, index) => {
    if (cells.every((cell) => cell.trim() === "")) return [];

    const fields: Record<string, string> = {};
    keys.forEach((key, column) => {
      if (key !== "") fields[key] = cells[column] ?? "";
    });

    // header is sheet row 1
    return [{ rowNumber: index + 2, fields }];
  });
}

// =============================================================================
// Row Validation
// =============================================================================

function pickField(
  fields: Readonly<Record<string, string>>,
  aliases: ReadonlyArray<string>,
): string | undefined {
  for (const alias of aliases) {
    const value = fields[alias];
    if (value !== undefined && value.trim() !== "") return value;
  }
  return undefined;
}

/**
 * Validate one row. Returns the frozen config or a readable reason.
 */
export function parseConfigRow(row: RawConfigRow): Result<ButtonConfig, string> {
  const candidate = {
    deviceId: pickField(row.fields, FIELD_ALIASES.deviceId),
    buttonIndex: pickField(row.fields, FIELD_ALIASES.buttonIndex),
    channel: pickField(row.fields, FIELD_ALIASES.channel),
    template: pickField(row.fields, FIELD_ALIASES.template),
    tab: pickField(row.fields, FIELD_ALIASES.tab),
    enabled: pickField(row.fields, FIELD_ALIASES.enabled),
    rateLimitSeconds: pickField(row.fields, FIELD_ALIASES.rateLimitSeconds),
  };

  const parsed = ButtonConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    const reason = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "row"}: ${issue.message}`)
      .join("; ");
    return err(reason);
  }

  return ok(Object.freeze({ ...parsed.data }));
}

// =============================================================================
// Table Building
// =============================================================================

/**
 * Lookup key for a (device, button) pair.
 */
export function configKey(deviceId: string, buttonIndex: number): string {
  return `${deviceId}#${buttonIndex}`;
}

/**
 * Build an immutable table from raw rows. Malformed rows and later
 * duplicates of an existing key are rejected, never propagated.
 */
export function buildConfigTable(
  rows: ReadonlyArray<RawConfigRow>,
  fetchedAt: number,
): ConfigTable {
  const buttons = new Map<string, ButtonConfig>();
  const rejected: RejectedRow[] = [];

  for (const row of rows) {
    const parsed = parseConfigRow(row);
    if (parsed.isErr()) {
      rejected.push({ rowNumber: row.rowNumber, reason: parsed.error });
      continue;
    }

    const key = configKey(parsed.value.deviceId, parsed.value.buttonIndex);
    if (buttons.has(key)) {
      rejected.push({
        rowNumber: row.rowNumber,
        reason: `duplicate of device ${parsed.value.deviceId} button ${parsed.value.buttonIndex}`,
      });
      continue;
    }

    buttons.set(key, parsed.value);
  }

  return Object.freeze({
    buttons,
    rejected: Object.freeze(rejected),
    fetchedAt,
  });
}

/**
 * Find a button in a table.
 */
export function lookupButton(
  table: ConfigTable,
  deviceId: string,
  buttonIndex: number,
): ButtonConfig | null {
  return table.buttons.get(configKey(deviceId, buttonIndex)) ?? null;
}

// =============================================================================
// Cache Freshness
// =============================================================================

export function isTableFresh(expiresAt: number, now: number): boolean {
  return now < expiresAt;
}

/**
 * Summarize cache state for health reporting.
 */
export function describeCache(
  table: ConfigTable | null,
  expiresAt: number,
  now: number,
): ConfigCacheStatus {
  if (!table) {
    return {
      loaded: false,
      buttonCount: 0,
      rejectedCount: 0,
      fetchedAt: null,
      expiresAt: null,
      stale: false,
    };
  }

  return {
    loaded: true,
    buttonCount: table.buttons.size,
    rejectedCount: table.rejected.length,
    fetchedAt: table.fetchedAt,
    expiresAt,
    stale: !isTableFresh(expiresAt, now),
  };
}
