/**
 * Button Config Module - Schemas and Types
 *
 * The per-button behavior table, fetched wholesale from the config
 * spreadsheet and validated at the boundary.
 * Schemas are the source of truth - types derived with z.infer<>.
 */
import { z } from "zod";

// =============================================================================
// Config Row (validated)
// =============================================================================

const TRUE_VALUES = ["true", "yes", "y", "1", "x", "on"];
const FALSE_VALUES = ["false", "no", "n", "0", "off"];

/**
 * Checkbox-style cell. Blank means enabled.
 */
const enabledCell = z
  .string()
  .optional()
  .transform((val, ctx) => {
    const normalized = (val ?? "").trim().toLowerCase();
    if (normalized === "" || TRUE_VALUES.includes(normalized)) return true;
    if (FALSE_VALUES.includes(normalized)) return false;
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Unrecognized enabled value "${val ?? ""}"`,
    });
    return z.NEVER;
  });

/**
 * One button row after header normalization and alias resolution.
 */
export const ButtonConfigSchema = z.object({
  deviceId: z.string().trim().min(1, "device id is required"),
  buttonIndex: z.coerce
    .number()
    .int("button number must be an integer")
    .nonnegative("button number must not be negative"),
  channel: z.string().trim().min(1, "channel is required"),
  template: z.string().default(""),
  tab: z.string().trim().min(1).default("Log"),
  enabled: enabledCell,
  rateLimitSeconds: z
    .string()
    .optional()
    .transform((val) => (val === undefined || val.trim() === "" ? "0" : val))
    .pipe(z.coerce.number().nonnegative("rate limit must not be negative")),
});

export type ButtonConfig = Readonly<z.output<typeof ButtonConfigSchema>>;

// =============================================================================
// Raw Rows
// =============================================================================

/**
 * A sheet row keyed by normalized header name.
 */
export type RawConfigRow = Readonly<{
  /** 1-based row number in the sheet, for error reports */
  rowNumber: number;
  fields: Readonly<Record<string, string>>;
}>;

/**
 * A row dropped at fetch time, with why.
 */
export type RejectedRow = Readonly<{
  rowNumber: number;
  reason: string;
}>;

// =============================================================================
// Cached Table
// =============================================================================

/**
 * Immutable snapshot of the whole table. Replaced wholesale on refresh.
 */
export type ConfigTable = Readonly<{
  buttons: ReadonlyMap<string, ButtonConfig>;
  rejected: ReadonlyArray<RejectedRow>;
  fetchedAt: number;
}>;

/**
 * Cache metadata exposed for health reporting.
 */
export type ConfigCacheStatus = Readonly<{
  loaded: boolean;
  buttonCount: number;
  rejectedCount: number;
  fetchedAt: number | null;
  expiresAt: number | null;
  stale: boolean;
}>;

/**
 * Header aliases, by field. First match wins.
 */
export const FIELD_ALIASES = {
  deviceId: ["device_id", "device", "button_id"],
  buttonIndex: ["button_num", "button", "button_index", "button_number"],
  channel: ["channel_id", "channel", "slack_channel"],
  template: ["message", "template", "message_template"],
  tab: ["log_tab", "tab", "sheet_tab"],
  enabled: ["enabled", "active"],
  rateLimitSeconds: ["rate_limit_seconds", "rate_limit"],
} as const satisfies Record<keyof ButtonConfig, ReadonlyArray<string>>;
