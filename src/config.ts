/**
 * Typed configuration - all config lives in .env, parsed with Zod at startup.
 * App crashes immediately on invalid config - fail fast.
 *
 * Button relay configuration covering:
 * - Server settings
 * - Device bridge (MQTT)
 * - Config spreadsheet + log spreadsheet (Google Sheets)
 * - Chat messaging (Slack)
 * - Transport queue and sink retry policies
 */
import { z } from "zod";

/**
 * Parse optional string - empty string becomes undefined
 */
const optionalString = z
  .string()
  .optional()
  .transform((val) => (val && val.trim() !== "" ? val : undefined));

const ConfigSchema = z.object({
  // ==========================================================================
  // Server Configuration
  // ==========================================================================
  PORT: z.coerce.number().default(8083).describe("HTTP server port"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development")
    .describe("Runtime environment"),
  APP_NAME: z.string().default("ButtonRelay").describe("Application name"),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("info")
    .describe("Pino log level"),

  // ==========================================================================
  // Device Bridge (MQTT)
  // ==========================================================================
  MQTT_BROKER_URL: z
    .string()
    .min(1, "MQTT_BROKER_URL is required")
    .describe("MQTT broker connection URL"),
  MQTT_TOPIC_PREFIX: z
    .string()
    .default("buttons")
    .describe("Topic prefix: <prefix>/<device>/<button>/press|status"),

  // ==========================================================================
  // Google Sheets (config table + log rows)
  // ==========================================================================
  SHEETS_API_URL: z
    .string()
    .url()
    .default("https://sheets.googleapis.com/v4")
    .describe("Google Sheets REST base URL"),
  SHEETS_SPREADSHEET_ID: optionalString.describe("Spreadsheet holding Config and log tabs"),
  SHEETS_ACCESS_TOKEN: optionalString.describe("OAuth access token for Sheets"),
  CONFIG_TAB: z.string().default("Config").describe("Tab holding the button table"),
  CONFIG_TTL_MS: z.coerce
    .number()
    .positive()
    .default(3_600_000)
    .describe("Button table cache lifetime (ms)"),

  // ==========================================================================
  // Slack
  // ==========================================================================
  SLACK_API_URL: z
    .string()
    .url()
    .default("https://slack.com/api")
    .describe("Slack Web API base URL"),
  SLACK_BOT_TOKEN: optionalString.describe("Slack bot OAuth token"),
  SLACK_FOLLOW_UP_SECONDS: z.coerce
    .number()
    .int()
    .nonnegative()
    .default(0)
    .describe("Response window before a posted message is marked (0 disables)"),

  // ==========================================================================
  // Transport (queue-backed delivery)
  // ==========================================================================
  TRANSPORT_MAX_ATTEMPTS: z.coerce
    .number()
    .int()
    .positive()
    .default(5)
    .describe("Deliveries before an event is dead-lettered"),
  TRANSPORT_BACKOFF_MS: z.coerce
    .number()
    .positive()
    .default(1000)
    .describe("Base redelivery delay, doubled per attempt (ms)"),
  TRANSPORT_MAX_BACKOFF_MS: z.coerce
    .number()
    .positive()
    .default(60_000)
    .describe("Redelivery delay ceiling (ms)"),
  TRANSPORT_VISIBILITY_TIMEOUT_MS: z.coerce
    .number()
    .positive()
    .default(30_000)
    .describe("Time a received message stays hidden before redelivery (ms)"),
  TRANSPORT_POLL_INTERVAL_MS: z.coerce
    .number()
    .positive()
    .default(500)
    .describe("Queue poll interval when idle (ms)"),
  TRANSPORT_BATCH_SIZE: z.coerce
    .number()
    .int()
    .positive()
    .default(10)
    .describe("Messages handled concurrently per poll"),

  // ==========================================================================
  // Sink retry policy
  // ==========================================================================
  SINK_MAX_ATTEMPTS: z.coerce
    .number()
    .int()
    .positive()
    .default(3)
    .describe("Attempts per sink per delivery"),
  SINK_BACKOFF_MS: z.coerce
    .number()
    .nonnegative()
    .default(250)
    .describe("Base delay between sink attempts (ms)"),
  SINK_TIMEOUT_MS: z.coerce
    .number()
    .positive()
    .default(5000)
    .describe("HTTP timeout per sink call (ms)"),
  ACK_POLICY: z
    .enum(["message", "any", "all"])
    .default("message")
    .describe("Which sink results acknowledge an event"),
});

// Parse at startup - crashes immediately if invalid
const parsed = ConfigSchema.safeParse(process.env);

if (!parsed.success) {
  console.error("❌ Invalid configuration:");
  console.error(parsed.error.format());
  process.exit(1);
}

export const config = parsed.data;

// Type export for use elsewhere
export type Config = z.infer<typeof ConfigSchema>;

// =============================================================================
// Derived Configuration Objects
// =============================================================================

/**
 * Slack configuration.
 * Returns null if no bot token is configured.
 */
export function getSlackConfig(): Readonly<{
  apiUrl: string;
  botToken: string;
  timeoutMs: number;
}> | null {
  if (!config.SLACK_BOT_TOKEN) {
    return null;
  }

  return {
    apiUrl: config.SLACK_API_URL,
    botToken: config.SLACK_BOT_TOKEN,
    timeoutMs: config.SINK_TIMEOUT_MS,
  };
}

/**
 * Follow-up on posted messages.
 * Returns null if Slack is not configured or the window is 0.
 */
export function getFollowUpConfig(): Readonly<{
  apiUrl: string;
  botToken: string;
  timeoutMs: number;
  windowMs: number;
}> | null {
  const slack = getSlackConfig();
  if (!slack || config.SLACK_FOLLOW_UP_SECONDS === 0) {
    return null;
  }

  return { ...slack, windowMs: config.SLACK_FOLLOW_UP_SECONDS * 1000 };
}

/**
 * Google Sheets configuration.
 * Returns null if the spreadsheet or token is missing.
 */
export function getSheetsConfig(): Readonly<{
  apiUrl: string;
  spreadsheetId: string;
  accessToken: string;
  timeoutMs: number;
}> | null {
  if (!config.SHEETS_SPREADSHEET_ID || !config.SHEETS_ACCESS_TOKEN) {
    return null;
  }

  return {
    apiUrl: config.SHEETS_API_URL,
    spreadsheetId: config.SHEETS_SPREADSHEET_ID,
    accessToken: config.SHEETS_ACCESS_TOKEN,
    timeoutMs: config.SINK_TIMEOUT_MS,
  };
}

/**
 * Transport worker configuration.
 */
export function getTransportConfig(): Readonly<{
  maxAttempts: number;
  backoffMs: number;
  maxBackoffMs: number;
  visibilityTimeoutMs: number;
  pollIntervalMs: number;
  batchSize: number;
}> {
  return {
    maxAttempts: config.TRANSPORT_MAX_ATTEMPTS,
    backoffMs: config.TRANSPORT_BACKOFF_MS,
    maxBackoffMs: config.TRANSPORT_MAX_BACKOFF_MS,
    visibilityTimeoutMs: config.TRANSPORT_VISIBILITY_TIMEOUT_MS,
    pollIntervalMs: config.TRANSPORT_POLL_INTERVAL_MS,
    batchSize: config.TRANSPORT_BATCH_SIZE,
  };
}

/**
 * Per-sink retry policy.
 */
export function getSinkRetryConfig(): Readonly<{
  maxAttempts: number;
  backoffMs: number;
}> {
  return {
    maxAttempts: config.SINK_MAX_ATTEMPTS,
    backoffMs: config.SINK_BACKOFF_MS,
  };
}

/**
 * MQTT topic layout for the device bridge.
 */
export const deviceTopics = {
  prefix: config.MQTT_TOPIC_PREFIX,
  press: `${config.MQTT_TOPIC_PREFIX}/+/+/press`,
} as const;
